import { describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import { parseArgs } from "../src/cli.ts";
import { useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

describe("parseArgs", () => {
  it("turns flags into config overrides", async () => {
    const overrides = await parseArgs([
      "--provider", "echo",
      "--model", "gpt-test",
      "--max-iterations", "3",
      "--timeout-ms", "1500",
      "--retries", "0",
      "--output-dir", "out",
      "--no-log-json",
      "--quiet",
      "--pretty",
    ]);
    expect(overrides).toEqual({
      provider: "echo",
      model: "gpt-test",
      maxIterations: 3,
      requestTimeoutMs: 1500,
      retries: 0,
      outputDir: "out",
      enableFileLogs: false,
      enableHumanLogs: false,
      prettyLogs: true,
    });
  });

  it("reads the system prompt from a file", async () => {
    const sandbox = getSandbox();
    await fs.writeFile(path.join(sandbox, "system.txt"), "Be brief.", "utf8");
    expect(await parseArgs(["--system", "system.txt"], sandbox)).toEqual({ systemPrompt: "Be brief." });
  });

  it("rejects bad input", async () => {
    await expect(parseArgs(["--max-iterations", "many"])).rejects.toThrow("--max-iterations must be a number");
    await expect(parseArgs(["--model"])).rejects.toThrow("--model requires a value");
    await expect(parseArgs(["--verbose"])).rejects.toThrow("Unknown option: --verbose");
    await expect(parseArgs(["--provider", "llama"])).rejects.toThrow('Unknown provider "llama"');
  });
});
