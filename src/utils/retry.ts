import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
  /** Maximum number of attempts (including the first). @default 3 */
  maxAttempts?: number;
  /** Delay in ms before the first retry. @default 1000 */
  baseDelayMs?: number;
  /** Multiplier applied to the delay after each failed attempt; 1 keeps it fixed. @default 1 */
  backoffFactor?: number;
  /** Maximum delay cap in ms. @default 15000 */
  maxDelayMs?: number;
  /** Label used in log messages for traceability. */
  label?: string;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
  ok: boolean;
  value?: T;
  error?: string;
  attempts: number;
  totalDurationMs: number;
}

export const RETRY_DEFAULTS: Required<Omit<RetryOptions, 'label'>> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffFactor: 1,
  maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded retry.
 *
 * - Calls `fn` at most `maxAttempts` times; a rejection counts as a failed attempt.
 * - `maxAttempts` below 1 is raised to 1; a non-finite value falls back to the default.
 * - Sleeps between attempts, never after the last one.
 * - Every failed attempt is logged with its label.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => pingBroker('kafka:9092'),
 *   { maxAttempts: 5, baseDelayMs: 500, label: 'kafka:ping' },
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const requestedAttempts = options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts;
  const maxAttempts = Number.isFinite(requestedAttempts)
    ? Math.max(1, Math.floor(requestedAttempts))
    : RETRY_DEFAULTS.maxAttempts;
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs);
  const backoffFactor = options.backoffFactor ?? RETRY_DEFAULTS.backoffFactor;
  const maxDelayMs = options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs;
  const label = options.label ?? 'unnamed';

  const start = Date.now();
  let lastError = '';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await fn();
      const totalDurationMs = Date.now() - start;

      if (attempt > 1) {
        void logThought(`[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`);
      }

      return { ok: true, value, attempts: attempt, totalDurationMs };
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);

      if (attempt < maxAttempts) {
        const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
        void logThought(
          `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
        );
        await sleep(delay);
      } else {
        void logThought(`[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`);
      }
    }
  }

  return {
    ok: false,
    error: lastError,
    attempts: maxAttempts,
    totalDurationMs: Date.now() - start,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
