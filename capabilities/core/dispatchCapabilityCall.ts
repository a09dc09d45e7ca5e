import { UnknownCapabilityError } from "./errors.js";
import type { CapabilityCall, JsonObject, JsonValue } from "./invocationResult.js";

export type CapabilityHandler = (
  args: JsonObject
) => JsonValue | Promise<JsonValue>;

export type CapabilityHandlers = Readonly<Record<string, CapabilityHandler>>;

export async function dispatchCapabilityCall(
  call: CapabilityCall,
  handlers: CapabilityHandlers
): Promise<JsonValue> {
  const handler = Object.hasOwn(handlers, call.name) ? handlers[call.name] : undefined;
  if (!handler) {
    throw new UnknownCapabilityError(call.name);
  }
  return handler(call.arguments);
}
