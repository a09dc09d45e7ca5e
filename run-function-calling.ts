import "dotenv/config";

import { loadInvokerConfig } from "./config/loadInvokerConfig.js";
import {
  StructuredCallInvoker,
  appendCapabilityResult,
} from "./capabilities/core/StructuredCallInvoker.js";
import { DispatchMode } from "./capabilities/core/dispatchMode.js";
import { dispatchCapabilityCall } from "./capabilities/core/dispatchCapabilityCall.js";
import type { InvocationResult } from "./capabilities/core/invocationResult.js";
import type { ChatMessage } from "./llm/chatCompletions.js";
import { CATALOG, CATALOG_HANDLERS, getCurrentWeather } from "./capabilities/catalog/index.js";

type Scenario = {
  label: string;
  input: string;
  mode: DispatchMode;
};

export const SCENARIOS: Record<string, Scenario> = {
  weather: {
    label: "auto: the model picks get_current_weather",
    input: "What's the weather like in Boston?",
    mode: DispatchMode.auto,
  },
  greeting: {
    label: "auto: small talk gets a plain answer",
    input: "Hello, how are you today?",
    mode: DispatchMode.auto,
  },
  none: {
    label: "none: calling is forbidden even for a weather question",
    input: "What's the weather like in Boston?",
    mode: DispatchMode.none,
  },
  commands: {
    label: "forced: get_commands shapes the answer as a command list",
    input: "How do I list the largest files in my home directory?",
    mode: DispatchMode.forced("get_commands"),
  },
};

type CliArgs =
  | { kind: "scenario"; names: string[] }
  | { kind: "adhoc"; scenario: Scenario };

export function parseArgs(argv: string[]): CliArgs {
  let scenario = "all";
  let input: string | null = null;
  let mode = "auto";
  let capability: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--scenario" && next !== undefined) {
      scenario = next;
      i++;
    } else if (arg === "--input" && next !== undefined) {
      input = next;
      i++;
    } else if (arg === "--mode" && next !== undefined) {
      mode = next;
      i++;
    } else if (arg === "--capability" && next !== undefined) {
      capability = next;
      i++;
    } else {
      throw new Error(`Unknown or incomplete argument: ${arg}`);
    }
  }

  if (input !== null) {
    return {
      kind: "adhoc",
      scenario: { label: "ad hoc", input, mode: parseMode(mode, capability) },
    };
  }

  if (scenario === "all") {
    return { kind: "scenario", names: Object.keys(SCENARIOS) };
  }
  if (!Object.hasOwn(SCENARIOS, scenario)) {
    throw new Error(
      `Unknown scenario ${scenario} (expected one of: all, ${Object.keys(SCENARIOS).join(", ")})`
    );
  }
  return { kind: "scenario", names: [scenario] };
}

function parseMode(mode: string, capability: string | null): DispatchMode {
  switch (mode) {
    case "auto":
      return DispatchMode.auto;
    case "none":
      return DispatchMode.none;
    case "forced":
      if (!capability) {
        throw new Error("--mode forced requires --capability <name>");
      }
      return DispatchMode.forced(capability);
    default:
      throw new Error(`Unknown mode ${mode} (expected auto, none or forced)`);
  }
}

export function formatResult(result: InvocationResult): string {
  switch (result.kind) {
    case "plain_text":
      return `text: ${result.text}`;
    case "capability_call":
      return `call: ${result.name} ${JSON.stringify(result.arguments)}`;
  }
}

async function runScenario(invoker: StructuredCallInvoker, scenario: Scenario) {
  console.log(`\n=== ${scenario.label} ===`);
  console.log(`> ${scenario.input}`);

  const result = await invoker.invoke({
    input: scenario.input,
    capabilities: CATALOG,
    mode: scenario.mode,
  });
  console.log(formatResult(result));

  // Weather calls get answered locally and handed back for a final reply.
  if (
    result.kind === "capability_call" &&
    result.name === getCurrentWeather.descriptor.name
  ) {
    const weather = await dispatchCapabilityCall(result, CATALOG_HANDLERS);
    const history: ChatMessage[] = appendCapabilityResult(
      [{ role: "user", content: scenario.input }],
      result,
      weather
    );
    const followUp = await invoker.invokeConversation({
      messages: history,
      capabilities: CATALOG,
      mode: DispatchMode.none,
    });
    console.log(formatResult(followUp));
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const invoker = new StructuredCallInvoker(loadInvokerConfig());

  const scenarios =
    args.kind === "adhoc" ? [args.scenario] : args.names.map((n) => SCENARIOS[n]);
  for (const scenario of scenarios) {
    await runScenario(invoker, scenario);
  }
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    main().catch((err) => {
      console.error(err);
      process.exit(1);
    });
  }
}
