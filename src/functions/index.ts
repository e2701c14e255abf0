import type { FunctionEntry } from "../registry.ts";
import { calculateAverage, calculateAverageDescriptor } from "./calculate_average.ts";
import { drawSineWave, drawSineWaveDescriptor } from "./draw_sine_wave.ts";
import { fibonacci, fibonacciDescriptor } from "./fibonacci.ts";
import { generateColorGradient, generateColorGradientDescriptor } from "./generate_color_gradient.ts";
import {
  clearGeneratedImages,
  clearGeneratedImagesDescriptor,
  listGeneratedImages,
  listGeneratedImagesDescriptor,
} from "./generated_images.ts";
import { textStatistics, textStatisticsDescriptor } from "./text_statistics.ts";

export const builtinFunctions: FunctionEntry[] = [
  { descriptor: calculateAverageDescriptor, handler: calculateAverage },
  { descriptor: fibonacciDescriptor, handler: fibonacci },
  { descriptor: textStatisticsDescriptor, handler: textStatistics },
  { descriptor: drawSineWaveDescriptor, handler: drawSineWave },
  { descriptor: generateColorGradientDescriptor, handler: generateColorGradient },
  { descriptor: listGeneratedImagesDescriptor, handler: listGeneratedImages },
  { descriptor: clearGeneratedImagesDescriptor, handler: clearGeneratedImages },
];
