import { z } from "zod";

// Wire shapes for the chat-completions endpoint (legacy `functions` flavor).

export type WireFunctionCall = {
  name: string;
  arguments: string;
};

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      function_call?: WireFunctionCall;
    }
  | { role: "function"; name: string; content: string };

export type WireParameterSchema = {
  type: "string" | "number" | "integer" | "boolean" | "array" | "object" | "null";
  description?: string;
  enum?: ReadonlyArray<string | number | boolean | null>;
  items?: WireParameterSchema;
  properties?: Readonly<Record<string, WireParameterSchema>>;
  required?: ReadonlyArray<string>;
};

export type WireFunctionDefinition = {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Readonly<Record<string, WireParameterSchema>>;
    required: ReadonlyArray<string>;
  };
};

export type WireFunctionCallMode = "auto" | "none" | { name: string };

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  functions?: WireFunctionDefinition[];
  function_call?: WireFunctionCallMode;
  temperature: number;
  stream: false;
};

export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          role: z.string(),
          content: z.string().nullable().optional(),
          function_call: z
            .object({
              name: z.string(),
              arguments: z.string(),
            })
            .nullable()
            .optional(),
        }),
      })
    )
    .min(1, "response has no choices"),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;
