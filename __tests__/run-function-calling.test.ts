import { describe, expect, it } from "vitest";
import { SCENARIOS, formatResult, parseArgs } from "../run-function-calling.js";

describe("parseArgs", () => {
  it("runs every scenario by default", () => {
    expect(parseArgs([])).toEqual({
      kind: "scenario",
      names: ["weather", "greeting", "none", "commands"],
    });
  });

  it("selects a single scenario", () => {
    expect(parseArgs(["--scenario", "commands"])).toEqual({
      kind: "scenario",
      names: ["commands"],
    });
  });

  it("builds an ad hoc forced invocation", () => {
    expect(
      parseArgs(["--input", "List files", "--mode", "forced", "--capability", "get_commands"])
    ).toEqual({
      kind: "adhoc",
      scenario: {
        label: "ad hoc",
        input: "List files",
        mode: { kind: "forced", capabilityName: "get_commands" },
      },
    });
  });

  it("rejects forced mode without a capability", () => {
    expect(() => parseArgs(["--input", "List files", "--mode", "forced"])).toThrow(
      "--mode forced requires --capability <name>"
    );
  });

  it("rejects unknown scenarios and flags", () => {
    expect(() => parseArgs(["--scenario", "poetry"])).toThrow(
      "Unknown scenario poetry (expected one of: all, weather, greeting, none, commands)"
    );
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown or incomplete argument: --verbose");
  });
});

describe("parseArgs with inherited object names", () => {
  it.each(["toString", "constructor", "__proto__"])("rejects --scenario %s", (name) => {
    expect(() => parseArgs(["--scenario", name])).toThrow(
      `Unknown scenario ${name} (expected one of: all, weather, greeting, none, commands)`
    );
  });
});

describe("SCENARIOS", () => {
  it("forces get_commands, the capability auto mode does not reliably pick", () => {
    expect(SCENARIOS.commands.mode).toEqual({ kind: "forced", capabilityName: "get_commands" });
    expect(SCENARIOS.weather.input).toBe("What's the weather like in Boston?");
  });
});

describe("formatResult", () => {
  it("prints text and calls on one line", () => {
    expect(formatResult({ kind: "plain_text", text: "Hi there" })).toBe("text: Hi there");
    expect(
      formatResult({
        kind: "capability_call",
        name: "get_current_weather",
        arguments: { location: "Boston" },
      })
    ).toBe('call: get_current_weather {"location":"Boston"}');
  });
});
