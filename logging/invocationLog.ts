/**
 * Structured logging for capability invocations.
 *
 * One JSON object per line on stdout. Credentials never pass through here.
 */

export type InvocationLogEvent =
  | "capability.invoke.started"
  | "capability.invoke.succeeded"
  | "capability.invoke.failed"
  | "capability.run.completed";

export type InvocationLogData = {
  event: InvocationLogEvent;
  model?: string;
  mode?: string;
  capabilities?: string[];
  message_count?: number;
  result?: string;
  duration_ms?: number;
  prompt_tokens?: number;
  completion_tokens?: number;
  error_name?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type InvocationLogSink = (data: InvocationLogData) => void;

export function invocationLog(data: InvocationLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export function logCapabilityRun({
  capability,
  input,
  output,
}: {
  capability: string;
  input: string;
  output: unknown;
}, sink: InvocationLogSink = invocationLog): void {
  sink({
    event: "capability.run.completed",
    capability,
    input,
    output,
  });
}
