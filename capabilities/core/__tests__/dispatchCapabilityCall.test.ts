import { describe, expect, it, vi } from "vitest";
import { dispatchCapabilityCall } from "../dispatchCapabilityCall.js";
import { UnknownCapabilityError } from "../errors.js";

describe("dispatchCapabilityCall", () => {
  it("hands the decoded arguments to the registered handler", async () => {
    const handler = vi.fn(async (args: Record<string, unknown>) => ({ echoed: String(args.location) }));

    const result = await dispatchCapabilityCall(
      { kind: "capability_call", name: "get_current_weather", arguments: { location: "Boston" } },
      { get_current_weather: handler }
    );

    expect(result).toEqual({ echoed: "Boston" });
    expect(handler).toHaveBeenCalledWith({ location: "Boston" });
  });

  it("throws UnknownCapabilityError for a name without a handler", async () => {
    await expect(
      dispatchCapabilityCall(
        { kind: "capability_call", name: "toString", arguments: {} },
        {}
      )
    ).rejects.toBeInstanceOf(UnknownCapabilityError);
  });
});
