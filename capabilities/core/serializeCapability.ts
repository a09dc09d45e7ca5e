import type { WireFunctionDefinition } from "../../llm/chatCompletions.js";
import type { CapabilityDescriptor } from "./CapabilityDescriptor.js";

export function serializeCapability(
  descriptor: CapabilityDescriptor
): WireFunctionDefinition {
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: {
      type: "object",
      properties: descriptor.parameterSchema.properties,
      required: [...descriptor.required],
    },
  };
}
