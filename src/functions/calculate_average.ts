import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";
import { numberList } from "./shared.ts";

export const calculateAverageDescriptor: FunctionDescriptor = {
  name: "calculate_average",
  description: "Calculate the average of a list of numbers",
  parameters: [
    { name: "numbers", type: "array", items: "number", required: true, description: "Numbers to average" },
  ],
};

export const calculateAverage: FunctionHandler = (args) => {
  const numbers = numberList(args.numbers, "numbers");
  if (!numbers.length) throw new Error("'numbers' must not be empty");
  return numbers.reduce((sum, n) => sum + n, 0) / numbers.length;
};
