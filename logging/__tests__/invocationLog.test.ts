import { afterEach, describe, expect, it, vi } from "vitest";
import { invocationLog, logCapabilityRun } from "../invocationLog.js";

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("invocationLog", () => {
  it("writes one timestamped JSON line per event", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-01T12:00:00.000Z"));
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    invocationLog({
      event: "capability.invoke.succeeded",
      model: "test-model",
      mode: "auto",
      result: "plain_text",
    });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe(
      '{"timestamp":"2025-01-01T12:00:00.000Z","event":"capability.invoke.succeeded","model":"test-model","mode":"auto","result":"plain_text"}'
    );
  });
});

describe("logCapabilityRun", () => {
  it("sends a run.completed event to the given sink", () => {
    const sink = vi.fn();

    logCapabilityRun(
      { capability: "get_commands", input: "List files", output: { commands: ["ls"] } },
      sink
    );

    expect(sink).toHaveBeenCalledWith({
      event: "capability.run.completed",
      capability: "get_commands",
      input: "List files",
      output: { commands: ["ls"] },
    });
  });
});
