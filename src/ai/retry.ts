/**
 * Retry with exponential backoff for model API calls.
 *
 * The client raises `RetryableError` for throttling and server-side
 * failures, carrying the status and any Retry-After hint. Network-level
 * fetch failures are retried too; everything else is thrown at once.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('retry');

export interface RetryOptions {
  maxRetries?: number;         // default: 3
  initialDelayMs?: number;     // default: 1000
  maxDelayMs?: number;         // default: 30000
  backoffMultiplier?: number;  // default: 2
  /** Operation name used in retry log lines */
  label?: string;
  onRetry?: (error: Error, attempt: number) => void;
}

export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

/** HTTP statuses worth another attempt */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

const NETWORK_ERROR_MARKERS = ['fetch failed', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'];

const DEFAULTS = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Parse a Retry-After header (delta seconds or HTTP date) to milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof RetryableError) return true;
  if (error instanceof Error) {
    return NETWORK_ERROR_MARKERS.some(marker => error.message.includes(marker));
  }
  return false;
}

/**
 * Execute `fn`, retrying retryable failures with jittered exponential
 * backoff. The last error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
  const initialDelayMs = options.initialDelayMs ?? DEFAULTS.initialDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULTS.backoffMultiplier;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxRetries) throw error;

      const hinted = error instanceof RetryableError ? error.retryAfterMs : undefined;
      const base = hinted ?? initialDelayMs * Math.pow(multiplier, attempt);
      const delayMs = Math.min(hinted === undefined ? addJitter(base) : base, maxDelayMs);

      const err = error instanceof Error ? error : new Error(String(error));
      log.debug(`${options.label ?? 'request'} failed (${err.message}); retry ${attempt + 1}/${maxRetries} in ${delayMs}ms`);
      options.onRetry?.(err, attempt + 1);

      await sleep(delayMs);
    }
  }
}

/** Spread retries between 0.5x and 1.5x of the base delay. */
function addJitter(delayMs: number): number {
  return Math.floor(delayMs * (0.5 + Math.random()));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
