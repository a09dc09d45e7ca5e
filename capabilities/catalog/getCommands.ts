import { z } from "zod";
import {
  CapabilityDefinition,
  defineCapability,
} from "../core/CapabilityDescriptor.js";

export const getCommandsArguments = z.object({
  commands: z.array(z.string().min(1)).min(1),
});

export type GetCommandsArguments = z.infer<typeof getCommandsArguments>;

// Shapes the answer rather than extracting intent, so `auto` rarely picks it;
// callers force it.
export const getCommands: CapabilityDefinition<GetCommandsArguments> = {
  descriptor: defineCapability({
    name: "get_commands",
    description: "Return the list of shell commands that accomplish the user's request",
    parameterSchema: {
      type: "object",
      properties: {
        commands: {
          type: "array",
          description: "Shell commands to run, in order",
          items: {
            type: "string",
            description: "A single command line",
          },
        },
      },
    },
    required: ["commands"],
  }),
  argumentsSchema: getCommandsArguments,
};
