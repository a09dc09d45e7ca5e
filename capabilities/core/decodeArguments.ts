import { DecodeError } from "./errors.js";
import type { JsonObject } from "./invocationResult.js";

export function decodeArguments(raw: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError(raw, err instanceof Error ? err.message : "invalid JSON");
  }

  if (!isJsonObject(parsed)) {
    throw new DecodeError(raw, `expected a JSON object, got ${jsonKind(parsed)}`);
  }
  return parsed;
}

// Only the root needs checking: everything below it came out of JSON.parse.
function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
