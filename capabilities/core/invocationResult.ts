export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type InvocationResult =
  | { kind: "plain_text"; text: string }
  | { kind: "capability_call"; name: string; arguments: JsonObject };

export type CapabilityCall = Extract<InvocationResult, { kind: "capability_call" }>;

export const plainText = (text: string): InvocationResult => ({
  kind: "plain_text",
  text,
});

export const capabilityCall = (
  name: string,
  args: JsonObject
): InvocationResult => ({
  kind: "capability_call",
  name,
  arguments: args,
});

export function describeResult(result: InvocationResult): string {
  switch (result.kind) {
    case "plain_text":
      return "plain_text";
    case "capability_call":
      return `capability_call:${result.name}`;
  }
}
