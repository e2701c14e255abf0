import { promises as fs } from "node:fs";
import path from "node:path";
import chalk from "chalk";
import cliTruncate from "cli-truncate";

export type HumanEntry = {
  title?: string;
  body?: string;
  variant?: "info" | "warn" | "error" | "model" | "function";
};

export type LoggerOptions = {
  provider: string;
  model: string;
  logJsonPath?: string | null;
  enableHumanLogs?: boolean;
  enableFileLogs?: boolean;
  pretty?: boolean;
  write?: (line: string) => void;
  /** Defaults to the terminal width. */
  columns?: number;
};

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(options: LoggerOptions) {
  const logPath = options.enableFileLogs === false || !options.logJsonPath
    ? null
    : path.resolve(process.cwd(), options.logJsonPath);
  const write = options.write ?? ((line: string) => console.log(line));
  const variantTheme = (entry: HumanEntry) => {
    const variant = entry.variant ?? "info";
    if (variant === "error") return { color: chalk.red, prefix: "[error]" };
    if (variant === "warn") return { color: chalk.yellow, prefix: "[warn]" };
    if (variant === "model") return { color: chalk.cyan, prefix: "[model]" };
    if (variant === "function") return { color: chalk.green, prefix: "[fn]" };
    return { color: chalk.blue, prefix: "[info]" };
  };
  const formatPrefix = (entry: HumanEntry) => {
    const theme = variantTheme(entry);
    const tag = entry.title ? `${theme.prefix} ${entry.title}` : theme.prefix;
    return { theme, tag: options.pretty ? theme.color.bold(tag) : tag };
  };

  const spinnerFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let spinnerTimer: ReturnType<typeof setInterval> | undefined;
  let spinnerFrame = 0;
  const stopSpinner = () => {
    if (!spinnerTimer) return;
    clearInterval(spinnerTimer);
    spinnerTimer = undefined;
    spinnerFrame = 0;
    process.stdout.write("\r\x1b[2K\r");
  };
  const startSpinner = () => {
    if (options.enableHumanLogs === false || options.pretty !== true || !process.stdout.isTTY) return () => {};
    stopSpinner();
    spinnerTimer = setInterval(() => {
      const frame = spinnerFrames[spinnerFrame % spinnerFrames.length];
      spinnerFrame++;
      process.stdout.write(`\r${chalk.gray(`thinking ${frame}`)}`);
    }, 120);
    return stopSpinner;
  };

  const human = options.enableHumanLogs === false
    ? (_entry: HumanEntry) => {}
    : (entry: HumanEntry) => {
        const width = Math.max(40, Math.min(options.columns ?? process.stdout.columns ?? 80, 140));
        const { tag, theme } = formatPrefix(entry);
        const body = cliTruncate(entry.body ?? "", width - 4);
        write(options.pretty ? `${tag} ${theme.color(body)}` : `${tag} ${body}`);
      };

  const json = async (entry: Record<string, unknown>) => {
    if (!logPath) return;
    const payload = {
      timestamp: new Date().toISOString(),
      provider: options.provider,
      model: options.model,
      ...entry,
    };
    try {
      await fs.appendFile(logPath, `${JSON.stringify(payload)}\n`, "utf8");
    } catch (err) {
      console.error(`log write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  return { human, json, startSpinner, stopSpinner };
}

export function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "<unserializable>";
  }
}
