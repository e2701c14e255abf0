#!/usr/bin/env tsx
import { promises as fs, realpathSync } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { loadConfig, parseProvider, type ConfigOverrides } from "./config.ts";
import { runSession } from "./runner.ts";

async function main() {
  const args = process.argv.slice(2);
  if (args.includes("-h") || args.includes("--help")) {
    printHelp();
    return;
  }
  const overrides = await parseArgs(args);
  const config = loadConfig(overrides);
  await runSession(config, { input: process.stdin, output: process.stdout });
}

export async function parseArgs(argv: string[], cwd: string = process.cwd()): Promise<ConfigOverrides> {
  const overrides: ConfigOverrides = {};
  const value = (i: number, flag: string) => {
    const raw = argv[i];
    if (raw === undefined) throw new Error(`${flag} requires a value`);
    return raw;
  };
  const numeric = (raw: string, flag: string) => {
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) throw new Error(`${flag} must be a number`);
    return parsed;
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--provider") {
      overrides.provider = parseProvider(value(++i, token));
      continue;
    }
    if (token === "--model") {
      overrides.model = value(++i, token);
      continue;
    }
    if (token === "--max-iterations") {
      overrides.maxIterations = numeric(value(++i, token), token);
      continue;
    }
    if (token === "--timeout-ms") {
      overrides.requestTimeoutMs = numeric(value(++i, token), token);
      continue;
    }
    if (token === "--retries") {
      overrides.retries = numeric(value(++i, token), token);
      continue;
    }
    if (token === "--output-dir") {
      overrides.outputDir = value(++i, token);
      continue;
    }
    if (token === "--log-json") {
      overrides.logJsonPath = value(++i, token);
      continue;
    }
    if (token === "--no-log-json") {
      overrides.enableFileLogs = false;
      continue;
    }
    if (token === "--quiet") {
      overrides.enableHumanLogs = false;
      continue;
    }
    if (token === "--pretty") {
      overrides.prettyLogs = true;
      continue;
    }
    if (token === "--system") {
      const abs = path.resolve(cwd, value(++i, token));
      overrides.systemPrompt = await fs.readFile(abs, "utf8");
      continue;
    }
    throw new Error(`Unknown option: ${token}`);
  }
  return overrides;
}

function printHelp() {
  console.log(`relay [options]
Starts an interactive chat where the model can call the built-in functions.
Options:
  --provider <openai|azure|echo>  LLM provider (default: openai)
  --model <name>                  Model name (default: gpt-4o-mini)
  --max-iterations <n>            Function-call rounds per message (default: 5)
  --timeout-ms <n>                Per-request model timeout in milliseconds (default: 60000)
  --retries <n>                   Retries for failed/timed-out model calls (default: 1)
  --output-dir <dir>              Where generated files go (default: generated_images)
  --system <file>                 Load system prompt from file
  --log-json <file>               Write JSON logs to file (default: .relay-log.jsonl)
  --no-log-json                   Disable JSONL logging
  --quiet                         Suppress human-readable logs
  --pretty                        Colored logs and a spinner while waiting
  --help                          Show this help

Credentials: RELAY_OPENAI_API_KEY or OPENAI_API_KEY (azure: RELAY_AZURE_OPENAI_KEY plus endpoint and deployment).
`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main().catch((err) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
