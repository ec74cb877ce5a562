/**
 * Retry Policy
 * Bounded retry-on-timeout around a single page render
 */

import type { PageRenderer, RenderResult } from '../rendering/renderer.types';
import { classifyError, isTimeoutError, RenderTimeoutError, TimeoutExhaustedError } from '../rendering/errors';
import { Url } from './crawling.types';

export const DEFAULT_ATTEMPT_LIMIT = 3;

// Extra time a renderer gets past its own timeout before the attempt is abandoned
export const DEFAULT_HANG_GRACE_MS = 5000;

export interface RetryOptions {
  /**
   * Total attempts, including the first
   */
  attemptLimit?: number;
  timeoutMs: number;
  hangGraceMs?: number;
  /**
   * Called before each retry with the number of the attempt that timed out
   */
  onRetry?: (attempt: number, error: RenderTimeoutError) => void;
}

export type FetchOutcome =
  | { ok: true; result: RenderResult; attempts: number }
  | { ok: false; error: TimeoutExhaustedError; attempts: number };

/**
 * Render a page, retrying immediately on timeout.
 * Timeouts are treated as transient renderer hangs, so there is no backoff.
 * Any other failure is thrown as a RenderError on the first occurrence.
 */
export async function fetchWithRetry(
  renderer: PageRenderer,
  url: Url,
  options: RetryOptions
): Promise<FetchOutcome> {
  const attemptLimit = Math.max(1, Math.floor(options.attemptLimit ?? DEFAULT_ATTEMPT_LIMIT));
  const hangGraceMs = options.hangGraceMs ?? DEFAULT_HANG_GRACE_MS;
  let lastTimeout: RenderTimeoutError | null = null;

  for (let attempt = 1; attempt <= attemptLimit; attempt++) {
    try {
      const result = await withHangGuard(
        renderer.render(url, options.timeoutMs),
        url,
        options.timeoutMs,
        hangGraceMs
      );
      return { ok: true, result, attempts: attempt };
    } catch (error) {
      const classified = classifyError(error, url, options.timeoutMs);
      if (!isTimeoutError(classified)) {
        throw classified;
      }

      lastTimeout = classified;
      if (attempt < attemptLimit && options.onRetry) {
        options.onRetry(attempt, classified);
      }
    }
  }

  return {
    ok: false,
    error: new TimeoutExhaustedError(url, attemptLimit, { cause: lastTimeout }),
    attempts: attemptLimit,
  };
}

/**
 * Reject with RenderTimeoutError if the render has not settled by timeout + grace.
 * The abandoned render keeps running; its late result or error is discarded.
 */
function withHangGuard<T>(
  render: Promise<T>,
  url: Url,
  timeoutMs: number,
  hangGraceMs: number
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new RenderTimeoutError(url, timeoutMs));
    }, timeoutMs + hangGraceMs);

    render.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
