import {
  clearInterval as nodeClearInterval,
  clearTimeout as nodeClearTimeout,
  setInterval as nodeSetInterval,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/** Handle returned by {@link runtimeTimers.setTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/** Handle returned by {@link runtimeTimers.setInterval}. */
export type IntervalHandle = ReturnType<typeof nodeSetInterval>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
  setInterval: nodeSetInterval,
  clearInterval: nodeClearInterval,
} as const;

/**
 * Looks the timer up on {@link globalThis} at call time so Sinon fake timers
 * installed by the tests drive retry delays, poll intervals and deadlines.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate: unknown = Reflect.get(globalThis, key);
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export const runtimeTimers = {
  setTimeout(callback: () => void, delayMs: number): TimeoutHandle {
    return resolveTimer("setTimeout")(callback, delayMs);
  },
  clearTimeout(handle: TimeoutHandle): void {
    resolveTimer("clearTimeout")(handle);
  },
  setInterval(callback: () => void, intervalMs: number): IntervalHandle {
    return resolveTimer("setInterval")(callback, intervalMs);
  },
  clearInterval(handle: IntervalHandle): void {
    resolveTimer("clearInterval")(handle);
  },
} as const;

/** Suspends for `delayMs` using the runtime-aware timers. */
export function sleep(delayMs: number): Promise<void> {
  return new Promise<void>((resolve) => {
    runtimeTimers.setTimeout(() => resolve(), Math.max(0, delayMs));
  });
}
