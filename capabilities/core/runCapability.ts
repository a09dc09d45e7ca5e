import {
  invocationLog,
  InvocationLogSink,
  logCapabilityRun,
} from "../../logging/invocationLog.js";
import type { CapabilityDefinition } from "./CapabilityDescriptor.js";
import { DispatchMode } from "./dispatchMode.js";
import { ArgumentValidationError, ShapeMismatchError } from "./errors.js";
import type { StructuredCallInvoker } from "./StructuredCallInvoker.js";

/**
 * Forces the model to call `definition` for `input` and returns the arguments
 * it produced, typed by the definition's zod schema.
 */
export async function runCapability<A>(
  invoker: StructuredCallInvoker,
  definition: CapabilityDefinition<A>,
  input: string,
  log: InvocationLogSink = invocationLog
): Promise<A> {
  const { descriptor } = definition;

  // 1. Force the call
  const result = await invoker.invoke({
    input,
    capabilities: [descriptor],
    mode: DispatchMode.forced(descriptor.name),
  });

  if (result.kind !== "capability_call") {
    throw new ShapeMismatchError(`forced(${descriptor.name})`, result.kind);
  }

  // 2. Validate arguments (with capability context)
  const parsed = definition.argumentsSchema.safeParse(result.arguments);
  if (!parsed.success) {
    throw new ArgumentValidationError(
      descriptor.name,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  // 3. Log only validated data
  logCapabilityRun(
    {
      capability: descriptor.name,
      input,
      output: parsed.data,
    },
    log
  );

  return parsed.data;
}
