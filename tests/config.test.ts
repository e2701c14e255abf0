import { describe, expect, it } from "vitest";
import { describeConfig, loadConfig } from "../src/config.ts";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({}, { OPENAI_API_KEY: "test-secret" });
    expect(config).toMatchObject({
      provider: "openai",
      model: "gpt-4o-mini",
      maxIterations: 5,
      apiKey: "test-secret",
      outputDir: "generated_images",
      requestTimeoutMs: 60_000,
      retries: 1,
      functionTimeoutMs: 30_000,
      logJsonPath: ".relay-log.jsonl",
      enableHumanLogs: true,
      enableFileLogs: true,
      prettyLogs: false,
    });
  });

  it("prefers relay-specific variables and lets overrides win", () => {
    const env = {
      OPENAI_API_KEY: "generic",
      RELAY_OPENAI_API_KEY: "test-secret",
      RELAY_MODEL: "env-model",
      RELAY_MAX_ITERATIONS: "3",
      RELAY_OUTPUT_DIR: "env-out",
    };
    const config = loadConfig({ model: "flag-model" }, env);
    expect(config.apiKey).toBe("test-secret");
    expect(config.model).toBe("flag-model");
    expect(config.maxIterations).toBe(3);
    expect(config.outputDir).toBe("env-out");
  });

  it("ignores malformed numeric variables", () => {
    const config = loadConfig({}, { OPENAI_API_KEY: "k", RELAY_MAX_ITERATIONS: "lots", RELAY_RETRIES: "-2" });
    expect(config.maxIterations).toBe(5);
    expect(config.retries).toBe(1);
  });

  it("requires a credential for remote providers", () => {
    expect(() => loadConfig({}, {})).toThrow("RELAY_OPENAI_API_KEY (or OPENAI_API_KEY) is required for the openai provider");
    expect(() => loadConfig({ provider: "azure" }, { AZURE_OPENAI_KEY: "k" })).toThrow(
      "Azure provider requires endpoint and deployment",
    );
    expect(loadConfig({ provider: "echo" }, {}).provider).toBe("echo");
  });

  it("rejects invalid overrides and providers", () => {
    expect(() => loadConfig({ provider: "echo", maxIterations: 0 }, {})).toThrow("maxIterations must be a positive integer");
    expect(() => loadConfig({}, { RELAY_PROVIDER: "llama" })).toThrow('Unknown provider "llama"');
  });

  it("keeps the credential out of the loggable view", () => {
    const view = describeConfig(loadConfig({}, { OPENAI_API_KEY: "test-secret" }));
    expect(view.apiKey).toBe("[set]");
    expect(JSON.stringify(view)).not.toContain("test-secret");
  });
});
