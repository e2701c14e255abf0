import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";

const MAX_TERMS = 1000;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export const fibonacciDescriptor: FunctionDescriptor = {
  name: "fibonacci",
  description: "Generate the first n numbers of the Fibonacci sequence, starting from 0. Values too large for a JSON number are returned as decimal strings",
  parameters: [
    { name: "n", type: "integer", required: true, description: "How many Fibonacci numbers to generate" },
  ],
};

export const fibonacci: FunctionHandler = (args) => {
  const n = typeof args.n === "number" ? args.n : 0;
  if (n > MAX_TERMS) throw new Error(`'n' must be at most ${MAX_TERMS}`);
  if (n <= 0) return [];
  const sequence: bigint[] = [0n, 1n];
  while (sequence.length < n) {
    sequence.push(sequence[sequence.length - 1] + sequence[sequence.length - 2]);
  }
  return sequence.slice(0, n).map(toJsonInteger);
};

/** Exact integers past Number.MAX_SAFE_INTEGER are returned as decimal strings. */
function toJsonInteger(value: bigint): number | string {
  return value <= MAX_SAFE ? Number(value) : value.toString();
}
