/**
 * Retry policy for rate-limited requests
 *
 * Only HTTP 429 is retried. The wait honours Retry-After (seconds or an
 * HTTP-date) when present and otherwise backs off exponentially with additive
 * jitter.
 */

import type { RetryConfig } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.25,
};

export const RATE_LIMIT_STATUS = 429;

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Parse a Retry-After header value into a delay in milliseconds
 *
 * An integer is a second count and is honoured exactly (0 included). Anything
 * else is tried as an HTTP-date; a date in the past yields 0.
 *
 * @returns Delay in milliseconds, or undefined if absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(date - now, 0);
}

/**
 * Exponential backoff for a 0-based attempt: base * 2^attempt, capped, plus
 * jitter in [0, jitterFactor * delay)
 */
export function calculateBackoff(
  attempt: number,
  config: Required<RetryConfig> = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random
): number {
  const delay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  const jitter = Math.floor(random() * delay * config.jitterFactor);
  return delay + jitter;
}

/**
 * Delay before the retry that follows a 429 on `attempt` (0-based)
 */
export function calculateDelay(
  attempt: number,
  retryAfter: string | null | undefined,
  config: Required<RetryConfig> = DEFAULT_RETRY_CONFIG,
  now: number = Date.now()
): number {
  return parseRetryAfter(retryAfter, now) ?? calculateBackoff(attempt, config);
}

// =============================================================================
// Sleep
// =============================================================================

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/** Longest delay setTimeout honours; larger values fire almost at once */
export const MAX_TIMER_MS = 2_147_483_647;

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Sleep for a specified duration; rejects with the signal's reason as soon as
 * the signal aborts. Delays beyond MAX_TIMER_MS are waited out in chunks.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await wait(chunk, signal);
    remaining -= chunk;
  } while (remaining > 0);
}
