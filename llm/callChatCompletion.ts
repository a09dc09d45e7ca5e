import {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatCompletionResponseSchema,
} from "./chatCompletions.js";

export type TransportErrorType =
  | "timeout"
  | "network_error"
  | "provider_error"
  | "invalid_response";

export type ChatCompletionCallResult =
  | {
      status: "ok";
      response: ChatCompletionResponse;
    }
  | {
      status: "error";
      error_type: TransportErrorType;
      message: string;
      http_status?: number;
    };

/**
 * One request, one response. Implementations never retry and never throw for
 * transport failures; they report them as `status: "error"`.
 */
export type CallChatCompletion = (
  request: ChatCompletionRequest
) => Promise<ChatCompletionCallResult>;

export type FetchTransportConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
};

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function createFetchTransport(
  config: FetchTransportConfig,
  fetchImpl: FetchLike = fetch
): CallChatCompletion {
  const endpoint = `${config.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  return async (request) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.timeoutMs);

    try {
      const response = await fetchImpl(endpoint, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify(request),
      });

      if (!response.ok) {
        const errorText = await safeReadError(response);
        return {
          status: "error",
          error_type: "provider_error",
          message: `Chat completions error ${response.status}: ${errorText}`,
          http_status: response.status,
        };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        return {
          status: "error",
          error_type: "invalid_response",
          message: "Chat completions returned a non-JSON body",
          http_status: response.status,
        };
      }

      const parsed = ChatCompletionResponseSchema.safeParse(body);
      if (!parsed.success) {
        return {
          status: "error",
          error_type: "invalid_response",
          message: `Chat completions returned an unexpected body: ${parsed.error.issues
            .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
            .join("; ")}`,
          http_status: response.status,
        };
      }

      return { status: "ok", response: parsed.data };
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        return {
          status: "error",
          error_type: "timeout",
          message: `Chat completions request timed out after ${config.timeoutMs}ms`,
        };
      }

      return {
        status: "error",
        error_type: "network_error",
        message: err instanceof Error ? err.message : String(err),
      };
    } finally {
      clearTimeout(timeout);
    }
  };
}

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}
