/**
 * Retry helpers: exponential backoff with jitter, an abortable sleep, and a
 * bounded retry wrapper for startup checks.
 */

import { setTimeout as delay } from 'timers/promises';
import { createLogger } from './logger';
import { CONSTANTS } from '../config/constants';
import { errorMessage } from './errors';

const logger = createLogger('RetryUtils');

export interface BackoffOptions {
  baseDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter, in [0, 1). */
  jitterRatio: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: CONSTANTS.RETRY_DELAY_MS,
  backoffMultiplier: CONSTANTS.RETRY_BACKOFF_MULTIPLIER,
  maxDelayMs: CONSTANTS.MAX_RETRY_DELAY_SECONDS * 1000,
  jitterRatio: CONSTANTS.RETRY_JITTER_RATIO,
};

/**
 * Delay before the given attempt (1-based count of consecutive failures).
 * The exponential part is capped at maxDelayMs before jitter is added.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const exponential = Math.min(
    options.baseDelayMs * Math.pow(options.backoffMultiplier, exponent),
    options.maxDelayMs
  );
  const jitter = Math.floor(random() * options.jitterRatio * exponential);
  return Math.floor(exponential) + jitter;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after ms, or early (without throwing) when the signal aborts. */
export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};

export interface RetryOptions {
  maxRetries: number;
  delayMs?: number;
  backoffMultiplier?: number;
  operation: string;
  sleep?: Sleep;
}

/**
 * Generic retry wrapper for async functions
 */
export async function withRetry<T>(
  asyncFunction: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxRetries,
    delayMs = CONSTANTS.RETRY_DELAY_MS,
    backoffMultiplier = CONSTANTS.RETRY_BACKOFF_MULTIPLIER,
    operation,
    sleep: wait = sleep,
  } = options;

  let lastError: unknown;
  let currentDelay = delayMs;
  const maxDelayMs = CONSTANTS.MAX_RETRY_DELAY_SECONDS * 1000;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      logger.debug(`${operation} - Attempt ${attempt}/${maxRetries}`);
      const result = await asyncFunction();

      if (attempt > 1) {
        logger.info(`${operation} succeeded on attempt ${attempt}/${maxRetries}`);
      }

      return result;
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries) {
        logger.error({ err: error }, `${operation} failed after ${maxRetries} attempts`);
        break;
      }

      logger.warn(
        { err: error },
        `${operation} failed on attempt ${attempt}/${maxRetries}. Retrying in ${currentDelay}ms`
      );

      await wait(currentDelay);

      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs);
    }
  }

  throw new Error(`${operation} failed after ${maxRetries} attempts: ${errorMessage(lastError)}`, {
    cause: lastError,
  });
}
