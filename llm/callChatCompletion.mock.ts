import type {
  CallChatCompletion,
  ChatCompletionCallResult,
} from "./callChatCompletion.js";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
} from "./chatCompletions.js";

export type ScriptedResponder = (
  request: ChatCompletionRequest
) => ChatCompletionCallResult | Promise<ChatCompletionCallResult>;

export type ScriptedTransport = {
  call: CallChatCompletion;
  requests: ChatCompletionRequest[];
};

/**
 * In-process stand-in for the chat-completions endpoint. Every request is
 * recorded, then answered by `responder`.
 */
export function createScriptedTransport(
  responder: ScriptedResponder
): ScriptedTransport {
  const requests: ChatCompletionRequest[] = [];
  return {
    requests,
    call: async (request) => {
      // Requests are serialized on the real wire; record what would be sent.
      requests.push(JSON.parse(JSON.stringify(request)));
      return responder(request);
    },
  };
}

export const textReply = (
  content: string | null,
  model = "mock-model"
): ChatCompletionCallResult => ({
  status: "ok",
  response: completion(model, { role: "assistant", content }),
});

export const functionCallReply = (
  name: string,
  args: string,
  model = "mock-model"
): ChatCompletionCallResult => ({
  status: "ok",
  response: completion(model, {
    role: "assistant",
    content: null,
    function_call: { name, arguments: args },
  }),
});

function completion(
  model: string,
  message: ChatCompletionResponse["choices"][number]["message"]
): ChatCompletionResponse {
  return {
    model,
    choices: [
      {
        finish_reason: message.function_call ? "function_call" : "stop",
        message,
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 },
  };
}
