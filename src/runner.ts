import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { describeConfig, type RelayConfig } from "./config.ts";
import { ConversationExecutor } from "./executor.ts";
import { builtinFunctions } from "./functions/index.ts";
import { buildClient } from "./llm.ts";
import { createLogger, type Logger } from "./logger.ts";
import { FunctionRegistry, type FunctionEntry } from "./registry.ts";
import { ResourceManager } from "./resources.ts";
import type { LLMClient } from "./types.ts";

export type Session = {
  executor: ConversationExecutor;
  registry: FunctionRegistry;
  resources: ResourceManager;
  logger: Logger;
};

export type SessionDeps = {
  client?: LLMClient;
  functions?: readonly FunctionEntry[];
  logger?: Logger;
};

export function createSession(config: RelayConfig, deps: SessionDeps = {}): Session {
  const logger = deps.logger ?? createLogger({
    provider: config.provider,
    model: config.model,
    logJsonPath: config.logJsonPath,
    enableHumanLogs: config.enableHumanLogs,
    enableFileLogs: config.enableFileLogs,
    pretty: config.prettyLogs,
  });
  const client = deps.client ?? buildClient(config);
  const resources = new ResourceManager(config.outputDir, logger);
  const registry = new FunctionRegistry(deps.functions ?? builtinFunctions, { resources, logger }, {
    timeoutMs: config.functionTimeoutMs,
  });
  registry.discover();
  const executor = new ConversationExecutor(client, registry, logger, {
    maxIterations: config.maxIterations,
    systemPrompt: config.systemPrompt,
    requestTimeoutMs: config.requestTimeoutMs,
    retries: config.retries,
  });
  return { executor, registry, resources, logger };
}

export type SessionIO = {
  input: Readable;
  output: Writable;
};

const EXIT_WORDS = new Set(["quit", "exit"]);

/** Reads one user message per line until quit/exit or end of input. */
export async function runSession(config: RelayConfig, io: SessionIO, deps: SessionDeps = {}) {
  const session = createSession(config, deps);
  const { executor, logger } = session;
  await logger.json({ type: "session_start", config: describeConfig(config) });
  await session.registry.flushEvents();
  const say = (text: string) => io.output.write(text);

  say("Hi! I can calculate, plot, analyze text and more.\nWhat would you like to explore? (type 'quit' to exit)\n");
  say("\nYou: ");
  const rl = readline.createInterface({ input: io.input, terminal: false, crlfDelay: Infinity });
  let turns = 0;
  // leaving the loop closes the interface
  for await (const raw of rl) {
    const line = raw.trim();
    if (EXIT_WORDS.has(line.toLowerCase())) break;
    if (line) {
      turns++;
      const response = await executor.runTurn(line);
      say(`\nAssistant: ${response.status === "done" ? response.text : response.message}\n`);
    }
    say("\nYou: ");
  }
  say("\nGoodbye!\n");
  await logger.json({ type: "session_end", turns });
  return session;
}
