import type { TransportErrorType } from "../../llm/callChatCompletion.js";

export class InvalidInvocationError extends Error {
  constructor(public reason: string) {
    super(`Invalid invocation: ${reason}`);
    this.name = "InvalidInvocationError";
  }
}

/**
 * Network or service failure. Carries the transport's diagnostic unchanged;
 * never retried.
 */
export class TransportError extends Error {
  constructor(
    public error_type: TransportErrorType,
    message: string,
    public http_status?: number
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class DecodeError extends Error {
  constructor(public raw: string, public reason: string) {
    super(`Could not decode capability arguments (${reason}): ${preview(raw)}`);
    this.name = "DecodeError";
  }
}

export class ShapeMismatchError extends Error {
  constructor(public mode: string, public received: string) {
    super(`Response shape does not match dispatch mode ${mode}: received ${received}`);
    this.name = "ShapeMismatchError";
  }
}

export class ArgumentValidationError extends Error {
  constructor(public capability: string, public issues: string[]) {
    super(
      `Arguments for ${capability} failed schema validation: ${issues.join("; ")}`
    );
    this.name = "ArgumentValidationError";
  }
}

export class UnknownCapabilityError extends Error {
  constructor(public capability: string) {
    super(`No handler registered for capability ${capability}`);
    this.name = "UnknownCapabilityError";
  }
}

function preview(raw: string): string {
  return raw.length > 200 ? `${raw.slice(0, 200)}...` : raw;
}
