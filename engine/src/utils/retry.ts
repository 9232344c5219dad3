/**
 * Cursor Installer Engine — Bounded Retry
 *
 * Runs an async operation up to `attempts` times with exponential backoff
 * and reports a typed outcome instead of throwing.
 */

import type { Logger } from "./logger";
import { errorMessage } from "../errors";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  baseDelayMs: number;
  /** Label used in log lines */
  label: string;
  logger: Logger;
  /** Return false for errors that another attempt cannot fix */
  isRetryable?: (err: unknown) => boolean;
  sleep?: Sleep;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; retryable: boolean };

/**
 * Delay before attempt `attempt + 1`: base, 2×base, 4×base, ...
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<RetryOutcome<T>> {
  const wait = opts.sleep ?? sleep;
  const attempts = Math.max(1, opts.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err: unknown) {
      lastError = err;
      const retryable = opts.isRetryable ? opts.isRetryable(err) : true;

      opts.logger.warn(
        { label: opts.label, attempt, attempts, error: errorMessage(err) },
        `${opts.label} failed (attempt ${attempt}/${attempts})`,
      );

      if (!retryable) {
        return { ok: false, error: err, attempts: attempt, retryable: false };
      }

      if (attempt < attempts) {
        await wait(backoffDelay(attempt, opts.baseDelayMs));
      }
    }
  }

  return { ok: false, error: lastError, attempts, retryable: true };
}
