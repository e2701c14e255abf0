import path from "node:path";
import type { ResourceHandle } from "../types.ts";

export type Rgb = [number, number, number];

export function numberList(value: unknown, name: string): number[] {
  if (!Array.isArray(value)) throw new Error(`'${name}' must be an array of numbers`);
  return value.map((item, i) => {
    if (typeof item !== "number" || !Number.isFinite(item)) throw new Error(`'${name}[${i}]' must be a number`);
    return item;
  });
}

export function rgbTriple(value: unknown, name: string): Rgb {
  const parts = numberList(value, name);
  if (parts.length !== 3) throw new Error(`'${name}' must have exactly 3 components`);
  const [r, g, b] = parts;
  for (const c of parts) {
    if (!Number.isInteger(c) || c < 0 || c > 255) throw new Error(`'${name}' components must be integers 0-255`);
  }
  return [r, g, b];
}

export function positiveInt(value: unknown, name: string, fallback: number, max: number) {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > max) {
    throw new Error(`'${name}' must be an integer between 1 and ${max}`);
  }
  return value;
}

export function toHex([r, g, b]: Rgb) {
  return `#${[r, g, b].map((c) => c.toString(16).padStart(2, "0")).join("")}`;
}

export function escapeXml(input: string) {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function relPath(abs: string) {
  return path.relative(process.cwd(), abs) || path.basename(abs);
}

export function describeResource(handle: ResourceHandle) {
  return { resource_id: handle.id, saved_path: relPath(handle.path) };
}
