import { errorMessage, TransportError, type TurnErrorKind } from "./errors.ts";
import { safeJson, type Logger } from "./logger.ts";
import type { FunctionRegistry, InvokeResult } from "./registry.ts";
import { withTimeout } from "./shared.ts";
import type { LLMClient, Message, ModelReply, ToolCallDescriptor, ToolDefinition } from "./types.ts";

export type ExecutorOptions = {
  maxIterations: number;
  systemPrompt?: string;
  requestTimeoutMs?: number;
  retries?: number;
};

export type AgentResponse =
  | { status: "done"; text: string; rounds: number }
  | {
      status: "failed";
      error: TurnErrorKind;
      /** Safe to show to the user. */
      message: string;
      detail: string;
      history: readonly Message[];
    };

export class ConversationExecutor {
  private messages: Message[] = [];
  private readonly systemPrompt: string;

  constructor(
    private client: LLMClient,
    private registry: FunctionRegistry,
    private logger: Logger,
    private options: ExecutorOptions,
  ) {
    this.systemPrompt = options.systemPrompt ?? defaultSystemPrompt(registry.discover().map((d) => d.name));
  }

  get history(): readonly Message[] {
    return this.messages;
  }

  reset() {
    this.messages = [];
  }

  async runTurn(userMessage: string): Promise<AgentResponse> {
    const tools = this.registry.toToolDefinitions();
    this.messages.push({ role: "user", content: userMessage });
    let iterations = 0;
    let round = 0;

    // awaiting model -> (done | dispatching calls -> awaiting model) until the round cap
    while (iterations <= this.options.maxIterations) {
      round++;
      let reply: ModelReply;
      try {
        reply = await this.callModel(tools, round);
      } catch (err) {
        return this.fail("TransportError", errorMessage(err), round);
      }
      await this.logger.json({ type: "model_response", round, content: reply.content, toolCalls: reply.toolCalls });

      if (!reply.toolCalls?.length) {
        if (reply.content === null) {
          return this.fail("TransportError", "model returned neither text nor function calls", round);
        }
        this.messages.push({ role: "assistant", content: reply.content });
        return { status: "done", text: reply.content, rounds: round };
      }

      this.logger.human({ title: "model", body: `round ${round} → ${reply.toolCalls.map((c) => c.name).join(", ")}`, variant: "model" });
      this.messages.push({ role: "assistant", content: reply.content, tool_calls: reply.toolCalls });
      for (const call of reply.toolCalls) {
        await this.dispatch(call, round);
      }

      iterations++;
    }

    return this.fail(
      "IterationLimitExceeded",
      `model kept requesting functions after ${this.options.maxIterations} rounds`,
      round,
    );
  }

  private async dispatch(call: ToolCallDescriptor, round: number) {
    this.logger.human({ title: call.name, body: `args=${safeJson(call.arguments)}`, variant: "function" });
    const result = await this.registry.invoke(call.name, call.arguments);
    const content = formatResult(result);
    if (result.ok) {
      this.logger.human({ title: call.name, body: content, variant: "function" });
    } else {
      this.logger.human({ title: call.name, body: content, variant: "error" });
    }
    await this.logger.json({
      type: result.ok ? "function_result" : "function_error",
      round,
      function: call.name,
      arguments: call.arguments,
      output: content,
      errorKind: result.ok ? undefined : result.error.kind,
    });
    this.messages.push({ role: "tool", content, name: call.name, tool_call_id: call.id });
  }

  private async callModel(tools: ToolDefinition[], round: number): Promise<ModelReply> {
    const stopSpinner = this.logger.startSpinner();
    try {
      let lastError: unknown;
      const attempts = Math.max(0, this.options.retries ?? 0) + 1;
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          const result = await withTimeout(
            () => this.client.generate(this.systemPrompt, [...this.messages], tools),
            this.options.requestTimeoutMs,
          );
          if (attempt > 1) {
            await this.logger.json({ type: "model_retry_success", round, attempt });
          }
          return result;
        } catch (err) {
          lastError = err;
          const message = errorMessage(err);
          const isLast = attempt === attempts;
          this.logger.human({ title: "model", body: `round ${round} attempt ${attempt} failed: ${message}`, variant: isLast ? "error" : "warn" });
          await this.logger.json({ type: "model_retry", round, attempt, error: message, terminal: isLast });
        }
      }
      throw new TransportError(errorMessage(lastError ?? "Unknown model error"), { cause: lastError });
    } finally {
      stopSpinner();
    }
  }

  private async fail(error: TurnErrorKind, detail: string, round: number): Promise<AgentResponse> {
    this.logger.human({ title: "turn", body: `${error}: ${detail}`, variant: "error" });
    await this.logger.json({ type: "turn_failed", round, error, detail });
    return { status: "failed", error, message: userFacingMessage(error, this.options.maxIterations), detail, history: [...this.messages] };
  }
}

export function formatResult(result: InvokeResult): string {
  if (!result.ok) return `error (${result.error.kind}): ${result.error.message}`;
  if (typeof result.value === "string") return result.value;
  if (result.value === undefined) return "null";
  return safeJson(result.value);
}

function userFacingMessage(error: TurnErrorKind, maxIterations: number) {
  if (error === "IterationLimitExceeded") {
    return `Sorry, I couldn't finish that within ${maxIterations} rounds of function calls. Could you narrow the request down?`;
  }
  return "Sorry, I couldn't reach the language model just now. Please try again in a moment.";
}

export function defaultSystemPrompt(functionNames: string[]) {
  return [
    "You are a helpful assistant with access to computational and visualization functions.",
    `Functions: ${functionNames.join(", ")}.`,
    "Use the functions to answer instead of describing what you could do; call several when a task needs them.",
    "If a function reports an error, fix the arguments and retry, or explain the failure plainly.",
    "When a function saves a file, tell the user where it was saved.",
    "Keep the conversation natural and replies concise.",
  ].join("\n");
}
