import {
  CallChatCompletion,
  createFetchTransport,
} from "../../llm/callChatCompletion.js";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
} from "../../llm/chatCompletions.js";
import type { InvokerConfig } from "../../config/loadInvokerConfig.js";
import { invocationLog, InvocationLogSink } from "../../logging/invocationLog.js";
import type { CapabilityDescriptor } from "./CapabilityDescriptor.js";
import { decodeArguments } from "./decodeArguments.js";
import { DispatchMode, describeMode, toWireFunctionCall } from "./dispatchMode.js";
import {
  InvalidInvocationError,
  ShapeMismatchError,
  TransportError,
} from "./errors.js";
import {
  CapabilityCall,
  InvocationResult,
  JsonValue,
  capabilityCall,
  describeResult,
  plainText,
} from "./invocationResult.js";
import { serializeCapability } from "./serializeCapability.js";

export type InvokeParams = {
  input: string;
  capabilities: ReadonlyArray<CapabilityDescriptor>;
  mode: DispatchMode;
};

export type InvokeConversationParams = {
  messages: ReadonlyArray<ChatMessage>;
  capabilities: ReadonlyArray<CapabilityDescriptor>;
  mode: DispatchMode;
};

export type StructuredCallInvokerOptions = {
  transport?: CallChatCompletion;
  log?: InvocationLogSink;
  now?: () => number;
};

/**
 * Sends one chat-completions request advertising the given capabilities and
 * returns either the model's text or its decoded capability call.
 *
 * Holds nothing between calls beyond its config and transport, so concurrent
 * invocations are independent.
 */
export class StructuredCallInvoker {
  private readonly transport: CallChatCompletion;
  private readonly log: InvocationLogSink;
  private readonly now: () => number;

  constructor(
    private readonly config: InvokerConfig,
    options: StructuredCallInvokerOptions = {}
  ) {
    this.transport = options.transport ?? createFetchTransport(config);
    this.log = options.log ?? invocationLog;
    this.now = options.now ?? Date.now;
  }

  async invoke(params: InvokeParams): Promise<InvocationResult> {
    if (params.input.trim() === "") {
      throw new InvalidInvocationError("input must be a non-empty string");
    }
    return this.invokeConversation({
      messages: [{ role: "user", content: params.input }],
      capabilities: params.capabilities,
      mode: params.mode,
    });
  }

  async invokeConversation(
    params: InvokeConversationParams
  ): Promise<InvocationResult> {
    const { messages, capabilities, mode } = params;
    assertInvocable(messages, capabilities, mode);

    const request = this.buildRequest(messages, capabilities, mode);
    const modeLabel = describeMode(mode);
    const startedAt = this.now();

    this.log({
      event: "capability.invoke.started",
      model: request.model,
      mode: modeLabel,
      capabilities: capabilities.map((c) => c.name),
      message_count: messages.length,
    });

    try {
      const outcome = await this.transport(request);
      if (outcome.status !== "ok") {
        throw new TransportError(
          outcome.error_type,
          outcome.message,
          outcome.http_status
        );
      }

      const result = interpretResponse(outcome.response, capabilities, mode);

      this.log({
        event: "capability.invoke.succeeded",
        model: outcome.response.model ?? request.model,
        mode: modeLabel,
        result: describeResult(result),
        duration_ms: this.now() - startedAt,
        prompt_tokens: outcome.response.usage?.prompt_tokens,
        completion_tokens: outcome.response.usage?.completion_tokens,
      });

      return result;
    } catch (err) {
      this.log({
        event: "capability.invoke.failed",
        model: request.model,
        mode: modeLabel,
        duration_ms: this.now() - startedAt,
        error_name: err instanceof Error ? err.name : "UnknownError",
        error_message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  private buildRequest(
    messages: ReadonlyArray<ChatMessage>,
    capabilities: ReadonlyArray<CapabilityDescriptor>,
    mode: DispatchMode
  ): ChatCompletionRequest {
    const request: ChatCompletionRequest = {
      model: this.config.model,
      messages: [...messages],
      temperature: this.config.temperature,
      stream: false,
    };

    // The endpoint rejects an empty `functions` list, and `function_call`
    // without functions.
    if (capabilities.length > 0) {
      request.functions = capabilities.map(serializeCapability);
      request.function_call = toWireFunctionCall(mode);
    }

    return request;
  }
}

/**
 * History for a follow-up turn: the assistant's call, then the local result
 * under the `function` role.
 */
export function appendCapabilityResult(
  messages: ReadonlyArray<ChatMessage>,
  call: CapabilityCall,
  result: JsonValue
): ChatMessage[] {
  return [
    ...messages,
    {
      role: "assistant",
      content: null,
      function_call: {
        name: call.name,
        arguments: JSON.stringify(call.arguments),
      },
    },
    {
      role: "function",
      name: call.name,
      content: JSON.stringify(result),
    },
  ];
}

function assertInvocable(
  messages: ReadonlyArray<ChatMessage>,
  capabilities: ReadonlyArray<CapabilityDescriptor>,
  mode: DispatchMode
): void {
  if (messages.length === 0) {
    throw new InvalidInvocationError("conversation must contain at least one message");
  }

  const names = new Set<string>();
  for (const capability of capabilities) {
    if (names.has(capability.name)) {
      throw new InvalidInvocationError(
        `capability name ${capability.name} is declared more than once`
      );
    }
    names.add(capability.name);
  }

  if (mode.kind === "forced" && !names.has(mode.capabilityName)) {
    throw new InvalidInvocationError(
      `forced capability ${mode.capabilityName} is not among the declared capabilities`
    );
  }
}

function interpretResponse(
  response: ChatCompletionResponse,
  capabilities: ReadonlyArray<CapabilityDescriptor>,
  mode: DispatchMode
): InvocationResult {
  const message = response.choices[0].message;
  const modeLabel = describeMode(mode);

  if (message.function_call) {
    const { name } = message.function_call;

    if (mode.kind === "none") {
      throw new ShapeMismatchError(modeLabel, `capability_call:${name}`);
    }
    if (mode.kind === "forced" && name !== mode.capabilityName) {
      throw new ShapeMismatchError(modeLabel, `capability_call:${name}`);
    }
    if (!capabilities.some((c) => c.name === name)) {
      throw new ShapeMismatchError(modeLabel, `capability_call:${name} (not declared)`);
    }

    return capabilityCall(name, decodeArguments(message.function_call.arguments));
  }

  const content = message.content;
  if (typeof content !== "string" || content.trim() === "") {
    throw new ShapeMismatchError(modeLabel, "empty message");
  }
  if (mode.kind === "forced") {
    throw new ShapeMismatchError(modeLabel, "plain_text");
  }

  return plainText(content);
}
