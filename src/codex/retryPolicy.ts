import type { StructuredLogger } from "../logger.js";
import { sleep } from "../runtime/timers.js";
import { CodexExecutionError } from "./errors.js";
import type { AggregateResult } from "./events.js";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;

/** Error fragments (lower case) that mark a dropped connection worth retrying. */
export const TRANSIENT_ERROR_PATTERNS = [
  "reconnecting",
  "stream disconnected",
  "stream closed",
  "connection reset",
  "connection refused",
  "network error",
] as const;

export interface RetryOptions {
  /** Retries after the first attempt; `maxRetries + 1` attempts in total. */
  readonly maxRetries?: number;
  readonly retryDelayMs?: number;
  readonly logger?: Pick<StructuredLogger, "info" | "warn">;
}

/** Whether any collected error message carries a transient pattern. */
export function isTransientFailure(errors: readonly string[]): boolean {
  return errors.some((message) => {
    const lower = message.toLowerCase();
    return TRANSIENT_ERROR_PATTERNS.some((pattern) => lower.includes(pattern));
  });
}

/**
 * Runs `attempt` until it yields a usable aggregate. Transient disconnections
 * and execution failures are retried after a fixed delay; any other error,
 * timeouts included, propagates at once. When every attempt fails the last
 * transient partial is returned if it carries messages or a thread id.
 */
export async function executeWithRetry(
  attempt: (attemptNumber: number) => Promise<AggregateResult>,
  options: RetryOptions = {},
): Promise<AggregateResult> {
  const maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
  const logger = options.logger;
  const totalAttempts = maxRetries + 1;

  let lastError: Error | undefined;
  let partial: AggregateResult | undefined;

  for (let attemptNumber = 1; attemptNumber <= totalAttempts; attemptNumber += 1) {
    if (attemptNumber > 1) {
      logger?.info("codex_retry_scheduled", { attempt: attemptNumber, of: totalAttempts, delay_ms: retryDelayMs });
      await sleep(retryDelayMs);
    }

    try {
      const result = await attempt(attemptNumber);
      if (!result.completed && isTransientFailure(result.errors)) {
        logger?.warn("codex_transient_failure", { attempt: attemptNumber, errors: result.errors });
        partial = result;
        lastError = new CodexExecutionError(`Retryable error: ${result.errors.join("; ")}`);
        continue;
      }
      return result;
    } catch (error) {
      if (!(error instanceof CodexExecutionError)) {
        throw error;
      }
      logger?.warn("codex_attempt_failed", { attempt: attemptNumber, message: error.message });
      lastError = error;
    }
  }

  if (partial?.hasUsefulOutput()) {
    logger?.info("codex_partial_result_returned", { thread_id: partial.threadId ?? null });
    return partial;
  }
  throw lastError ?? new CodexExecutionError("All retry attempts failed");
}
