import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";
import { describeResource, escapeXml } from "./shared.ts";

const WIDTH = 1000;
const HEIGHT = 600;
const MARGIN = 50;
const SAMPLES = 1000;
const X_MAX = 10;

export const drawSineWaveDescriptor: FunctionDescriptor = {
  name: "draw_sine_wave",
  description: "Draw a sine wave plot (x from 0 to 10) and save it as an SVG image",
  parameters: [
    { name: "amplitude", type: "number", required: false, description: "Amplitude of the wave (default 1)" },
    { name: "frequency", type: "number", required: false, description: "Frequency of the wave in cycles per unit (default 1)" },
  ],
};

export const drawSineWave: FunctionHandler = async (args, { resources }) => {
  const amplitude = typeof args.amplitude === "number" ? args.amplitude : 1;
  const frequency = typeof args.frequency === "number" ? args.frequency : 1;
  const svg = renderSineWave(amplitude, frequency);
  const handle = await resources.store("svg", svg, "sine_wave");
  return describeResource(handle);
};

export function sineWavePoints(amplitude: number, frequency: number, samples = SAMPLES): [number, number][] {
  const points: [number, number][] = [];
  for (let i = 0; i < samples; i++) {
    const x = samples === 1 ? 0 : (X_MAX * i) / (samples - 1);
    points.push([x, amplitude * Math.sin(2 * Math.PI * frequency * x)]);
  }
  return points;
}

export function renderSineWave(amplitude: number, frequency: number): string {
  const scaleY = (HEIGHT / 2 - MARGIN) / (Math.abs(amplitude) || 1);
  const scaleX = (WIDTH - 2 * MARGIN) / X_MAX;
  const mid = HEIGHT / 2;
  const polyline = sineWavePoints(amplitude, frequency)
    .map(([x, y]) => `${(MARGIN + x * scaleX).toFixed(2)},${(mid - y * scaleY).toFixed(2)}`)
    .join(" ");
  const title = escapeXml(`Sine Wave (Amplitude: ${amplitude}, Frequency: ${frequency})`);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="30" text-anchor="middle" font-family="sans-serif" font-size="18">${title}</text>`,
    `<line x1="${MARGIN}" y1="${mid}" x2="${WIDTH - MARGIN}" y2="${mid}" stroke="#cccccc"/>`,
    `<polyline fill="none" stroke="#1f77b4" stroke-width="2" points="${polyline}"/>`,
    `</svg>`,
  ].join("\n");
}
