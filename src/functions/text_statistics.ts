import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";

export type TextStatistics = {
  word_count: number;
  char_count: number;
  avg_word_length: number;
  sentence_count: number;
};

export const textStatisticsDescriptor: FunctionDescriptor = {
  name: "text_statistics",
  description: "Analyze a piece of text: word count, character count, average word length and sentence count",
  parameters: [
    { name: "text", type: "string", required: true, description: "Text to analyze" },
  ],
};

export const textStatistics: FunctionHandler = (args): TextStatistics => {
  const text = typeof args.text === "string" ? args.text : "";
  const words = text.split(/\s+/).filter(Boolean);
  const letters = words.reduce((sum, word) => sum + [...word].length, 0);
  return {
    word_count: words.length,
    char_count: [...text].length,
    avg_word_length: words.length ? letters / words.length : 0,
    sentence_count: (text.match(/[.!?]/g) ?? []).length,
  };
};
