import { OracleError, OracleExhaustedError } from "../errors.js";
import type { Sleep } from "../sleep.js";

export type BackoffOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  sleep: Sleep;
  classify: (err: unknown) => OracleError;
  onRetry?: (info: { attempt: number; delayMs: number; error: OracleError }) => void;
};

export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Runs `op` until it succeeds, a non-retryable error surfaces, or `maxAttempts` is spent.
 * Delays double from `baseDelayMs`. Exhaustion is promoted to a fatal OracleExhaustedError.
 */
export async function withBackoff<T>(op: (attempt: number) => Promise<T>, opts: BackoffOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await op(attempt);
    } catch (err: unknown) {
      const classified = opts.classify(err);
      if (!classified.retryable) throw classified;
      if (attempt >= maxAttempts - 1) throw new OracleExhaustedError(attempt + 1, classified);
      const delayMs = backoffDelayMs(opts.baseDelayMs, attempt);
      opts.onRetry?.({ attempt: attempt + 1, delayMs, error: classified });
      await opts.sleep(delayMs);
    }
  }
}
