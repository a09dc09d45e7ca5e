import { z, ZodSchema } from "zod";
import type { WireParameterSchema } from "../../llm/chatCompletions.js";

export type ParameterSchema = WireParameterSchema;

export interface CapabilityDescriptor {
  readonly name: string;
  readonly description: string;

  readonly parameterSchema: {
    readonly type: "object";
    readonly properties: Readonly<Record<string, ParameterSchema>>;
  };

  readonly required: ReadonlyArray<string>;
}

/**
 * A descriptor plus the zod schema its decoded arguments must satisfy.
 */
export interface CapabilityDefinition<A> {
  descriptor: CapabilityDescriptor;
  argumentsSchema: ZodSchema<A>;
}

export const CAPABILITY_NAME_REGEX = /^[a-zA-Z0-9_-]{1,64}$/;

const ParameterSchemaSchema: z.ZodType<ParameterSchema> = z.lazy(() =>
  z
    .object({
      type: z.enum(["string", "number", "integer", "boolean", "array", "object", "null"]),
      description: z.string().optional(),
      enum: z
        .array(z.union([z.string(), z.number(), z.boolean(), z.null()]))
        .min(1)
        .optional(),
      items: ParameterSchemaSchema.optional(),
      properties: z.record(ParameterSchemaSchema).optional(),
      required: z.array(z.string()).optional(),
    })
    .strict()
    .superRefine((schema, ctx) => {
      if (schema.type === "array" && !schema.items) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "array parameters must declare items",
        });
      }
      for (const name of schema.required ?? []) {
        if (!schema.properties || !(name in schema.properties)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `required property ${name} is not declared`,
          });
        }
      }
    })
);

export const CapabilityDescriptorSchema = z
  .object({
    name: z
      .string()
      .regex(CAPABILITY_NAME_REGEX, "name must be 1-64 characters of [a-zA-Z0-9_-]"),
    description: z.string().min(1),
    parameterSchema: z
      .object({
        type: z.literal("object"),
        properties: z.record(ParameterSchemaSchema),
      })
      .strict(),
    required: z.array(z.string()),
  })
  .strict()
  .superRefine((descriptor, ctx) => {
    const seen = new Set<string>();
    for (const name of descriptor.required) {
      if (!(name in descriptor.parameterSchema.properties)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["required"],
          message: `required parameter ${name} is not declared in parameterSchema`,
        });
      }
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["required"],
          message: `required parameter ${name} is listed twice`,
        });
      }
      seen.add(name);
    }
  });

/**
 * Validates a descriptor and returns a deep-frozen copy.
 */
export function defineCapability(input: CapabilityDescriptor): CapabilityDescriptor {
  const parsed = CapabilityDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(
      `Capability ${input.name} is not a valid descriptor: ${parsed.error.issues
        .map((i) => i.message)
        .join("; ")}`
    );
  }
  return deepFreeze(parsed.data);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
