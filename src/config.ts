import { ConfigError } from "./errors.ts";

export type Provider = "openai" | "azure" | "echo";

export type RelayConfig = {
  provider: Provider;
  model: string;
  maxIterations: number;
  apiKey?: string;
  baseURL?: string;
  azureEndpoint?: string;
  azureDeployment?: string;
  azureApiVersion: string;
  outputDir: string;
  requestTimeoutMs: number;
  retries: number;
  functionTimeoutMs: number;
  systemPrompt?: string;
  logJsonPath: string | null;
  enableHumanLogs: boolean;
  enableFileLogs: boolean;
  prettyLogs: boolean;
};

export type ConfigOverrides = Partial<Omit<RelayConfig, "apiKey">>;

type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_OUTPUT_DIR = "generated_images";
export const DEFAULT_LOG_JSON = ".relay-log.jsonl";

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): RelayConfig {
  const provider = overrides.provider ?? parseProvider(env.RELAY_PROVIDER ?? "openai");
  const config: RelayConfig = {
    provider,
    model: overrides.model ?? env.RELAY_MODEL ?? DEFAULT_MODEL,
    maxIterations: overrides.maxIterations ?? envInt(env, "RELAY_MAX_ITERATIONS", DEFAULT_MAX_ITERATIONS),
    apiKey: provider === "azure"
      ? env.RELAY_AZURE_OPENAI_KEY ?? env.AZURE_OPENAI_KEY
      : env.RELAY_OPENAI_API_KEY ?? env.OPENAI_API_KEY,
    baseURL: overrides.baseURL ?? env.RELAY_OPENAI_BASE_URL ?? env.OPENAI_BASE_URL,
    azureEndpoint: overrides.azureEndpoint ?? env.RELAY_AZURE_OPENAI_ENDPOINT ?? env.AZURE_OPENAI_ENDPOINT,
    azureDeployment: overrides.azureDeployment ?? env.RELAY_AZURE_OPENAI_DEPLOYMENT ?? env.AZURE_OPENAI_DEPLOYMENT,
    azureApiVersion: overrides.azureApiVersion
      ?? env.RELAY_AZURE_OPENAI_API_VERSION
      ?? env.AZURE_OPENAI_API_VERSION
      ?? "2024-10-01-preview",
    outputDir: overrides.outputDir ?? env.RELAY_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    requestTimeoutMs: overrides.requestTimeoutMs ?? envInt(env, "RELAY_TIMEOUT_MS", 60_000),
    retries: overrides.retries ?? envInt(env, "RELAY_RETRIES", 1, 0),
    functionTimeoutMs: overrides.functionTimeoutMs ?? envInt(env, "RELAY_FUNCTION_TIMEOUT_MS", 30_000),
    systemPrompt: overrides.systemPrompt,
    logJsonPath: overrides.logJsonPath !== undefined ? overrides.logJsonPath : env.RELAY_LOG_JSON ?? DEFAULT_LOG_JSON,
    enableHumanLogs: overrides.enableHumanLogs ?? true,
    enableFileLogs: overrides.enableFileLogs ?? true,
    prettyLogs: overrides.prettyLogs ?? false,
  };
  validateConfig(config);
  return config;
}

function validateConfig(config: RelayConfig) {
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigError("maxIterations must be a positive integer");
  }
  if (!Number.isFinite(config.requestTimeoutMs) || config.requestTimeoutMs < 0) {
    throw new ConfigError("requestTimeoutMs must be a non-negative number");
  }
  if (!Number.isInteger(config.retries) || config.retries < 0) {
    throw new ConfigError("retries must be a non-negative integer");
  }
  if (config.provider === "echo") return;
  if (!config.apiKey) {
    throw new ConfigError(
      config.provider === "azure"
        ? "RELAY_AZURE_OPENAI_KEY (or AZURE_OPENAI_KEY) is required for the azure provider"
        : "RELAY_OPENAI_API_KEY (or OPENAI_API_KEY) is required for the openai provider",
    );
  }
  if (config.provider === "azure" && (!config.azureEndpoint || !config.azureDeployment)) {
    throw new ConfigError("Azure provider requires endpoint and deployment (RELAY_AZURE_OPENAI_ENDPOINT/DEPLOYMENT)");
  }
}

export function parseProvider(raw: string): Provider {
  if (raw === "openai" || raw === "azure" || raw === "echo") return raw;
  throw new ConfigError(`Unknown provider "${raw}" (expected openai, azure or echo)`);
}

/** Everything but the credential, for logs. */
export function describeConfig(config: RelayConfig): Record<string, unknown> {
  const { apiKey, systemPrompt, ...rest } = config;
  return { ...rest, apiKey: apiKey ? "[set]" : "[unset]", customSystemPrompt: systemPrompt !== undefined };
}

function envInt(env: Env, name: string, fallback: number, min = 1) {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}
