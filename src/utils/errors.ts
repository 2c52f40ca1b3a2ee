/**
 * Error Handling Utilities
 *
 * Provides typed application errors, deadlines and retry logic for
 * transient Telegram API failures.
 */

import { GrammyError, HttpError } from 'grammy';
import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational: boolean = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A call did not settle before its deadline
 */
export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
  }
}

/**
 * Telegram API call failed
 */
export class TransportError extends AppError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${detail}`, 'TRANSPORT_ERROR');
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Environment did not validate
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.join('\n')}`, 'CONFIGURATION_ERROR', false);
    this.issues = issues;
  }
}

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /** Maximum number of attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Optional custom retry condition */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  // Network failure between us and api.telegram.org
  if (error instanceof HttpError) {
    return true;
  }

  // Flood control and Bot API server errors
  if (error instanceof GrammyError) {
    return error.error_code === 429 || error.error_code >= 500;
  }

  if (error instanceof TransportError) {
    return isRetryableError(error.cause);
  }

  return false;
}

/**
 * Bot API rejected the request itself (4xx other than flood control).
 * Repeating it will not help, and it says nothing about Telegram's health.
 */
export function isClientError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return isClientError(error.cause);
  }
  return (
    error instanceof GrammyError &&
    error.error_code >= 400 &&
    error.error_code < 500 &&
    error.error_code !== 429
  );
}

/**
 * Wait Telegram asked for in a 429 response, in ms
 */
export function retryAfterMs(error: unknown): number | undefined {
  if (error instanceof TransportError) {
    return retryAfterMs(error.cause);
  }
  if (error instanceof GrammyError && error.parameters.retry_after !== undefined) {
    return error.parameters.retry_after * 1000;
  }
  return undefined;
}

/**
 * Execute a function with retry logic for transient failures
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? isRetryableError;

  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      // A 429 names its own wait; the backoff schedule carries on after it
      const wait = retryAfterMs(error) ?? delay;

      logger.warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay: wait,
          context,
          error: error instanceof Error ? error.message : String(error),
        },
        'Retrying after transient error'
      );

      await sleep(wait);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Race a promise against a deadline.
 * The timer is always cleared, so a settled call leaves nothing scheduled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Reduce an unknown thrown value to a loggable message
 */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
