import type { WireFunctionCallMode } from "../../llm/chatCompletions.js";

export type DispatchMode =
  | { kind: "auto" }
  | { kind: "none" }
  | { kind: "forced"; capabilityName: string };

export const DispatchMode = {
  auto: { kind: "auto" } as const satisfies DispatchMode,
  none: { kind: "none" } as const satisfies DispatchMode,
  forced: (capabilityName: string): DispatchMode => ({
    kind: "forced",
    capabilityName,
  }),
};

export function toWireFunctionCall(mode: DispatchMode): WireFunctionCallMode {
  switch (mode.kind) {
    case "auto":
      return "auto";
    case "none":
      return "none";
    case "forced":
      return { name: mode.capabilityName };
  }
}

export function describeMode(mode: DispatchMode): string {
  return mode.kind === "forced" ? `forced(${mode.capabilityName})` : mode.kind;
}
