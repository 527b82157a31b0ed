import { Range } from "../config";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function randomBetween(range: Range, random: () => number = Math.random): number {
  const [min, max] = range;
  if (max <= min) {
    return min;
  }
  return Math.round(min + random() * (max - min));
}

/**
 * Parses a Retry-After header: delta-seconds or an HTTP-date.
 * Returns milliseconds, or undefined when the header is absent or unusable.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(at - now, 0);
}
