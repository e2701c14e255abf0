import { describe, expect, it } from "vitest";
import { ConversationExecutor, formatResult, type ExecutorOptions } from "../src/executor.ts";
import { FunctionCallError } from "../src/errors.ts";
import { FunctionRegistry, type FunctionEntry } from "../src/registry.ts";
import type { LLMClient, ModelReply } from "../src/types.ts";
import { callReply, memoryLogger, sandboxResources, ScriptedClient, useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

const order: string[] = [];

const functions: FunctionEntry[] = [
  {
    descriptor: {
      name: "add",
      description: "Add two numbers",
      parameters: [
        { name: "a", type: "number", required: true, description: "First" },
        { name: "b", type: "number", required: true, description: "Second" },
      ],
    },
    handler: (args) => {
      order.push("add");
      return Number(args.a) + Number(args.b);
    },
  },
  {
    descriptor: { name: "shout", description: "Upper-case text", parameters: [{ name: "text", type: "string", required: true, description: "Text" }] },
    handler: (args) => {
      order.push("shout");
      return String(args.text).toUpperCase();
    },
  },
  {
    descriptor: { name: "explode", description: "Always fails", parameters: [] },
    handler: () => {
      throw new Error("kaboom");
    },
  },
];

function buildExecutor(client: LLMClient, options: Partial<ExecutorOptions> = {}) {
  const { logger, lines } = memoryLogger();
  const registry = new FunctionRegistry(functions, { resources: sandboxResources(getSandbox(), logger), logger });
  const executor = new ConversationExecutor(client, registry, logger, { maxIterations: 5, systemPrompt: "test system", ...options });
  return { executor, lines };
}

describe("ConversationExecutor.runTurn", () => {
  it("finishes in one round when the model answers with text", async () => {
    const client = new ScriptedClient([{ content: "Hello there" }]);
    const { executor } = buildExecutor(client);
    const response = await executor.runTurn("hi");
    expect(response).toEqual({ status: "done", text: "Hello there", rounds: 1 });
    expect(executor.history).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello there" },
    ]);
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0].systemPrompt).toBe("test system");
    expect(client.calls[0].tools?.map((t) => t.name)).toEqual(["add", "shout", "explode"]);
  });

  it("dispatches calls in the requested order and resends history with the results", async () => {
    order.length = 0;
    const client = new ScriptedClient([
      {
        content: null,
        toolCalls: [
          { id: "c1", name: "shout", arguments: { text: "hey" } },
          { id: "c2", name: "add", arguments: { a: 2, b: 3 } },
        ],
      },
      { content: "HEY and 5" },
    ]);
    const { executor } = buildExecutor(client);
    const response = await executor.runTurn("do things");
    expect(response).toEqual({ status: "done", text: "HEY and 5", rounds: 2 });
    expect(order).toEqual(["shout", "add"]);
    expect(client.calls[1].messages.slice(2)).toEqual([
      { role: "tool", content: "HEY", name: "shout", tool_call_id: "c1" },
      { role: "tool", content: "5", name: "add", tool_call_id: "c2" },
    ]);
    expect(executor.history).toHaveLength(5);
  });

  it("records a failing function as a result turn and keeps going", async () => {
    const client = new ScriptedClient([callReply("explode", {}, "c1"), { content: "It failed, sorry." }]);
    const { executor } = buildExecutor(client);
    const response = await executor.runTurn("blow up");
    expect(response.status).toBe("done");
    expect(client.calls).toHaveLength(2);
    expect(client.calls[1].messages[2]).toEqual({
      role: "tool",
      content: "error (ExecutionFailure): kaboom",
      name: "explode",
      tool_call_id: "c1",
    });
  });

  it("reports unknown functions and bad arguments to the model", async () => {
    const client = new ScriptedClient([
      {
        content: null,
        toolCalls: [
          { id: "c1", name: "nope", arguments: {} },
          { id: "c2", name: "add", arguments: { a: 1 } },
          { id: "c3", name: "add", arguments: null },
        ],
      },
      { content: "ok" },
    ]);
    const { executor } = buildExecutor(client);
    await executor.runTurn("try");
    expect(client.calls[1].messages.slice(2).map((m) => m.content)).toEqual([
      "error (UnknownFunction): Function nope not found",
      'error (ArgumentMismatch): missing required parameter "b"',
      "error (ArgumentMismatch): arguments must be an object",
    ]);
  });

  it("fails with IterationLimitExceeded on exactly the sixth round when max is 5", async () => {
    const client = new ScriptedClient([callReply("add", { a: 1, b: 1 })]);
    const { executor } = buildExecutor(client, { maxIterations: 5 });
    const response = await executor.runTurn("loop forever");
    expect(client.calls).toHaveLength(6);
    expect(response.status).toBe("failed");
    if (response.status === "failed") {
      expect(response.error).toBe("IterationLimitExceeded");
      expect(response.message).toBe(
        "Sorry, I couldn't finish that within 5 rounds of function calls. Could you narrow the request down?",
      );
      // user message + 6 x (assistant call + tool result)
      expect(response.history).toHaveLength(13);
    }
  });

  it("still succeeds when the model stops on the last allowed round", async () => {
    const client = new ScriptedClient([
      callReply("add", { a: 1, b: 1 }),
      callReply("add", { a: 1, b: 1 }),
      { content: "done" },
    ]);
    const { executor } = buildExecutor(client, { maxIterations: 2 });
    const response = await executor.runTurn("two rounds");
    expect(response).toEqual({ status: "done", text: "done", rounds: 3 });
  });

  it("resets the iteration counter for each user turn", async () => {
    let round = 0;
    const client = new ScriptedClient([
      () => (++round % 2 === 1 ? callReply("add", { a: 1, b: 2 }) : { content: `turn done ${round}` }),
    ]);
    const { executor } = buildExecutor(client, { maxIterations: 1 });
    expect((await executor.runTurn("first")).status).toBe("done");
    expect((await executor.runTurn("second")).status).toBe("done");
    expect(client.calls).toHaveLength(4);
  });

  it("surfaces transport errors with an apology and keeps partial history", async () => {
    const client = new ScriptedClient([new Error("connect ECONNREFUSED"), { content: "back" }]);
    const { executor, lines } = buildExecutor(client, { retries: 0 });
    const response = await executor.runTurn("anyone there?");
    expect(response).toEqual({
      status: "failed",
      error: "TransportError",
      message: "Sorry, I couldn't reach the language model just now. Please try again in a moment.",
      detail: "connect ECONNREFUSED",
      history: [{ role: "user", content: "anyone there?" }],
    });
    expect(lines).toContain("[error] turn TransportError: connect ECONNREFUSED");

    await executor.runTurn("again");
    expect(client.calls[1].messages.map((m) => m.content)).toEqual(["anyone there?", "again"]);
  });

  it("hands back a history snapshot that later turns do not change", async () => {
    const client = new ScriptedClient([new Error("connect ECONNREFUSED"), { content: "back" }]);
    const { executor } = buildExecutor(client, { retries: 0 });
    const failed = await executor.runTurn("first");
    expect(failed.status).toBe("failed");
    const history = failed.status === "failed" ? failed.history : [];
    expect(history).toHaveLength(1);

    await executor.runTurn("second");
    expect(executor.history).toHaveLength(3);
    expect(history).toEqual([{ role: "user", content: "first" }]);
  });

  it("retries a failed model call before giving up", async () => {
    const client = new ScriptedClient([new Error("flaky"), { content: "recovered" }]);
    const { executor } = buildExecutor(client, { retries: 1 });
    const response = await executor.runTurn("hello");
    expect(response).toEqual({ status: "done", text: "recovered", rounds: 1 });
    expect(client.calls).toHaveLength(2);
  });

  it("times out a hanging model call", async () => {
    const client = new ScriptedClient([() => new Promise<ModelReply>(() => {})]);
    const { executor } = buildExecutor(client, { requestTimeoutMs: 20, retries: 0 });
    const response = await executor.runTurn("hello");
    expect(response.status === "failed" && response.detail).toBe("Timed out after 20 ms");
  });

  it("treats an empty model reply as a transport error", async () => {
    const client = new ScriptedClient([{ content: null }]);
    const { executor } = buildExecutor(client, { retries: 0 });
    const response = await executor.runTurn("hello");
    expect(response.status === "failed" && response.detail).toBe("model returned neither text nor function calls");
  });

  it("clears history on reset", async () => {
    const { executor } = buildExecutor(new ScriptedClient([{ content: "hi" }]));
    await executor.runTurn("hello");
    executor.reset();
    expect(executor.history).toEqual([]);
  });
});

describe("formatResult", () => {
  it("serializes non-string values as JSON", () => {
    expect(formatResult({ ok: true, value: { a: [1, 2] } })).toBe('{"a":[1,2]}');
    expect(formatResult({ ok: true, value: "plain" })).toBe("plain");
    expect(formatResult({ ok: true, value: undefined })).toBe("null");
  });

  it("describes errors with their kind", () => {
    const error = new FunctionCallError("ArgumentMismatch", "add", 'missing required parameter "b"');
    expect(formatResult({ ok: false, error })).toBe('error (ArgumentMismatch): missing required parameter "b"');
  });
});
