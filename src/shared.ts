export function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

/** Rejects after timeoutMs; a missing or non-positive timeout waits forever. */
export async function withTimeout<T>(fn: () => T, timeoutMs?: number): Promise<Awaited<T>> {
  if (!timeoutMs || timeoutMs <= 0) return await fn();
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      Promise.resolve().then(fn),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs} ms`)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
