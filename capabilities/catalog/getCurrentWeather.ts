import { z } from "zod";
import {
  CapabilityDefinition,
  defineCapability,
} from "../core/CapabilityDescriptor.js";
import type { JsonObject, JsonValue } from "../core/invocationResult.js";

export const getCurrentWeatherArguments = z.object({
  location: z.string().min(1),
  unit: z.enum(["celsius", "fahrenheit"]).optional(),
});

export type GetCurrentWeatherArguments = z.infer<typeof getCurrentWeatherArguments>;

export const getCurrentWeather: CapabilityDefinition<GetCurrentWeatherArguments> = {
  descriptor: defineCapability({
    name: "get_current_weather",
    description: "Get the current weather in a given location",
    parameterSchema: {
      type: "object",
      properties: {
        location: {
          type: "string",
          description: "The city and state, e.g. San Francisco, CA",
        },
        unit: {
          type: "string",
          enum: ["celsius", "fahrenheit"],
        },
      },
    },
    required: ["location"],
  }),
  argumentsSchema: getCurrentWeatherArguments,
};

/**
 * Canned local implementation; always reports the same sunny, windy day.
 */
export function currentWeatherHandler(args: JsonObject): JsonValue {
  const parsed = getCurrentWeatherArguments.parse(args);
  return {
    location: parsed.location,
    temperature: "72",
    unit: parsed.unit ?? "fahrenheit",
    forecast: ["sunny", "windy"],
  };
}
