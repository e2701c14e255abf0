import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";
import { describeResource, positiveInt, rgbTriple, toHex, type Rgb } from "./shared.ts";

const MAX_SIDE = 4096;

export const generateColorGradientDescriptor: FunctionDescriptor = {
  name: "generate_color_gradient",
  description: "Generate an image with a horizontal color gradient between two RGB colors and save it as SVG",
  parameters: [
    { name: "start_color", type: "array", items: "integer", required: true, description: "RGB start color, e.g. [255, 0, 0]" },
    { name: "end_color", type: "array", items: "integer", required: true, description: "RGB end color, e.g. [0, 0, 255]" },
    { name: "width", type: "integer", required: false, description: "Image width in pixels (default 300)" },
    { name: "height", type: "integer", required: false, description: "Image height in pixels (default 100)" },
  ],
};

export const generateColorGradient: FunctionHandler = async (args, { resources }) => {
  const start = rgbTriple(args.start_color, "start_color");
  const end = rgbTriple(args.end_color, "end_color");
  const width = positiveInt(args.width, "width", 300, MAX_SIDE);
  const height = positiveInt(args.height, "height", 100, MAX_SIDE);
  const handle = await resources.store("svg", renderGradient(start, end, width, height), "gradient");
  return { ...describeResource(handle), start: toHex(start), end: toHex(end), width, height };
};

/** Color of pixel column x, truncated to integers. */
export function gradientColumn(start: Rgb, end: Rgb, x: number, width: number): Rgb {
  const at = (i: 0 | 1 | 2) => Math.trunc(start[i] + ((end[i] - start[i]) * x) / width);
  return [at(0), at(1), at(2)];
}

export function renderGradient(start: Rgb, end: Rgb, width: number, height: number): string {
  const last = gradientColumn(start, end, width - 1, width);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<defs><linearGradient id="g" x1="0" y1="0" x2="1" y2="0">`,
    `<stop offset="0" stop-color="${toHex(start)}"/>`,
    `<stop offset="1" stop-color="${toHex(last)}"/>`,
    `</linearGradient></defs>`,
    `<rect width="${width}" height="${height}" fill="url(#g)"/>`,
    `</svg>`,
  ].join("\n");
}
