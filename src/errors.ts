export type FunctionErrorKind = "UnknownFunction" | "ArgumentMismatch" | "ExecutionFailure";
export type TurnErrorKind = "TransportError" | "IterationLimitExceeded";

export class FunctionCallError extends Error {
  readonly kind: FunctionErrorKind;
  readonly functionName: string;

  constructor(kind: FunctionErrorKind, functionName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FunctionCallError";
    this.kind = kind;
    this.functionName = functionName;
  }
}

/** Model unreachable, timed out, or answered with something unusable. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
