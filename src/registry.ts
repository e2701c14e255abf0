import { errorMessage, FunctionCallError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { ResourceManager } from "./resources.ts";
import { isPlainObject, withTimeout } from "./shared.ts";
import type { FunctionDescriptor, FunctionParameter, ParameterType, ToolDefinition } from "./types.ts";

export type FunctionContext = {
  resources: ResourceManager;
  logger: Logger;
};

export type FunctionHandler = (args: Record<string, unknown>, context: FunctionContext) => unknown;

export type FunctionEntry = {
  descriptor: FunctionDescriptor;
  handler: FunctionHandler;
};

export type InvokeResult =
  | { ok: true; value: unknown }
  | { ok: false; error: FunctionCallError };

export type RegistryOptions = {
  timeoutMs?: number;
};

const NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
const PARAMETER_TYPES: readonly ParameterType[] = ["string", "number", "integer", "boolean", "array", "object"];

export class FunctionRegistry {
  private snapshot: readonly FunctionDescriptor[] | undefined;
  private handlers = new Map<string, FunctionEntry>();
  private pendingEvents: Record<string, unknown>[] = [];

  constructor(
    private entries: readonly FunctionEntry[],
    private context: FunctionContext,
    private options: RegistryOptions = {},
  ) {}

  /** Validates the registration table once; later calls return the same frozen snapshot. */
  discover(): readonly FunctionDescriptor[] {
    if (this.snapshot) return this.snapshot;
    const accepted: FunctionDescriptor[] = [];
    for (const entry of this.entries) {
      const problem = this.validate(entry.descriptor);
      if (problem) {
        this.exclude(entry.descriptor.name, problem);
        continue;
      }
      const descriptor = freezeDescriptor(entry.descriptor);
      this.handlers.set(descriptor.name, { descriptor, handler: entry.handler });
      accepted.push(descriptor);
    }
    this.snapshot = Object.freeze(accepted);
    this.context.logger.human({ title: "registry", body: `loaded ${accepted.length} functions` });
    return this.snapshot;
  }

  /** Writes the JSONL events queued by discover(), which runs synchronously. */
  async flushEvents() {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    for (const event of events) {
      await this.context.logger.json(event);
    }
  }

  toToolDefinitions(): ToolDefinition[] {
    return this.discover().map(toToolDefinition);
  }

  async invoke(name: string, args: unknown): Promise<InvokeResult> {
    this.discover();
    const entry = this.handlers.get(name);
    if (!entry) {
      return fail("UnknownFunction", name, `Function ${name} not found`);
    }
    const mismatch = checkArguments(entry.descriptor, args);
    if (mismatch || !isPlainObject(args)) {
      return fail("ArgumentMismatch", name, mismatch ?? "arguments must be an object");
    }
    const input = args;
    try {
      const value = await withTimeout(() => entry.handler(input, this.context), this.options.timeoutMs);
      return { ok: true, value };
    } catch (err) {
      return fail("ExecutionFailure", name, errorMessage(err), err);
    }
  }

  private validate(descriptor: FunctionDescriptor): string | undefined {
    if (!NAME_PATTERN.test(descriptor.name)) return "name must match [a-zA-Z0-9_-]{1,64}";
    if (this.handlers.has(descriptor.name)) return "duplicate name";
    if (!descriptor.description?.trim()) return "missing description";
    const seen = new Set<string>();
    for (const param of descriptor.parameters) {
      if (!param.name || seen.has(param.name)) return `invalid or duplicate parameter "${param.name}"`;
      seen.add(param.name);
      if (!PARAMETER_TYPES.includes(param.type)) return `parameter "${param.name}" has no valid type`;
      if (param.items !== undefined && (param.type !== "array" || !PARAMETER_TYPES.includes(param.items))) {
        return `parameter "${param.name}" has an invalid item type`;
      }
      if (!param.description?.trim()) return `parameter "${param.name}" has no description`;
    }
    return undefined;
  }

  private exclude(name: string, reason: string) {
    this.context.logger.human({ title: "registry", body: `skipping ${name || "<unnamed>"}: ${reason}`, variant: "warn" });
    this.pendingEvents.push({ type: "function_excluded", name, reason });
  }
}

function fail(kind: FunctionCallError["kind"], name: string, message: string, cause?: unknown): InvokeResult {
  return { ok: false, error: new FunctionCallError(kind, name, message, cause === undefined ? undefined : { cause }) };
}

/** Returns a description of the first problem, or undefined when the arguments satisfy the descriptor. */
export function checkArguments(descriptor: FunctionDescriptor, args: unknown): string | undefined {
  if (!isPlainObject(args)) return "arguments must be an object";
  for (const param of descriptor.parameters) {
    const value = args[param.name];
    if (value === undefined || value === null) {
      if (param.required) return `missing required parameter "${param.name}"`;
      continue;
    }
    if (!matchesType(value, param.type)) return `parameter "${param.name}" must be ${article(param.type)}`;
    if (param.type === "array" && param.items && Array.isArray(value)) {
      const itemType = param.items;
      const bad = value.findIndex((item) => !matchesType(item, itemType));
      if (bad >= 0) return `parameter "${param.name}" item ${bad} must be ${article(itemType)}`;
    }
  }
  return undefined;
}

function matchesType(value: unknown, type: ParameterType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isPlainObject(value);
  }
}

function article(type: ParameterType) {
  return type === "array" || type === "integer" || type === "object" ? `an ${type}` : `a ${type}`;
}

function freezeDescriptor(descriptor: FunctionDescriptor): FunctionDescriptor {
  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description.trim(),
    parameters: Object.freeze(descriptor.parameters.map((p) => Object.freeze({ ...p }))),
  });
}

export function toToolDefinition(descriptor: FunctionDescriptor): ToolDefinition {
  const properties: Record<string, unknown> = {};
  for (const param of descriptor.parameters) {
    properties[param.name] = schemaFor(param);
  }
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: {
      type: "object",
      properties,
      required: descriptor.parameters.filter((p) => p.required).map((p) => p.name),
    },
  };
}

function schemaFor(param: FunctionParameter): Record<string, unknown> {
  if (param.type === "array") {
    return { type: "array", items: { type: param.items ?? "string" }, description: param.description };
  }
  return { type: param.type, description: param.description };
}
