import { readFileSync } from "node:fs";
import { z } from "zod";

export type InvokerConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature: number;
};

export const DEFAULT_INVOKER_CONFIG: Omit<InvokerConfig, "apiKey"> = {
  baseUrl: "https://api.openai.com/v1",
  model: "gpt-3.5-turbo",
  timeoutMs: 45000,
  temperature: 0,
};

// Largest delay setTimeout honors; longer ones fire after 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid invoker configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalNonEmpty,
  OPENAI_API_KEY_FILE: optionalNonEmpty,
  OPENAI_BASE_URL: optionalNonEmpty.pipe(z.string().url().optional()),
  OPENAI_MODEL: optionalNonEmpty,
  LLM_TIMEOUT_MS: optionalNonEmpty.pipe(z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional()),
  LLM_TEMPERATURE: optionalNonEmpty.pipe(z.coerce.number().min(0).max(2).optional()),
});

/**
 * Reads the invoker configuration once. The API key comes from OPENAI_API_KEY
 * or, failing that, from the file named by OPENAI_API_KEY_FILE.
 */
export function loadInvokerConfig(
  env: Record<string, string | undefined> = process.env,
  readFile: (path: string) => string = (path) => readFileSync(path, "utf8")
): InvokerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const vars = parsed.data;

  return {
    apiKey: resolveApiKey(vars.OPENAI_API_KEY, vars.OPENAI_API_KEY_FILE, readFile),
    baseUrl: vars.OPENAI_BASE_URL ?? DEFAULT_INVOKER_CONFIG.baseUrl,
    model: vars.OPENAI_MODEL ?? DEFAULT_INVOKER_CONFIG.model,
    timeoutMs: vars.LLM_TIMEOUT_MS ?? DEFAULT_INVOKER_CONFIG.timeoutMs,
    temperature: vars.LLM_TEMPERATURE ?? DEFAULT_INVOKER_CONFIG.temperature,
  };
}

function resolveApiKey(
  inline: string | undefined,
  file: string | undefined,
  readFile: (path: string) => string
): string {
  if (inline) return inline;
  if (!file) {
    throw new ConfigError(["OPENAI_API_KEY or OPENAI_API_KEY_FILE must be set"]);
  }

  let contents: string;
  try {
    contents = readFile(file);
  } catch (err) {
    throw new ConfigError([
      `OPENAI_API_KEY_FILE could not be read (${file}): ${
        err instanceof Error ? err.message : String(err)
      }`,
    ]);
  }

  const key = contents.trim();
  if (key === "") {
    throw new ConfigError([`OPENAI_API_KEY_FILE is empty (${file})`]);
  }
  return key;
}
