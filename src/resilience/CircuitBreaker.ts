/**
 * Circuit Breaker - Resilience Pattern for the Telegram Bot API
 *
 * Wraps a call in an Opossum circuit breaker so that, while Telegram is
 * failing, admin checks fail fast instead of piling up behind the deadline.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Service failure detected, requests fail fast
 * - HALF-OPEN: Testing if service recovered
 *
 * @module resilience/CircuitBreaker
 */

import CircuitBreakerLib from 'opossum';
import type { Logger } from 'pino';
import { logger as defaultLogger } from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Circuit breaker states
 */
export type CircuitState = 'closed' | 'open' | 'halfOpen';

/**
 * Circuit breaker options
 */
export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Timeout in ms, or false for none (default: 10000) */
  timeout?: number | false;
  /** Percentage of failures to trip (default: 50) */
  errorThresholdPercentage?: number;
  /** Time to wait before half-open (default: 30000) */
  resetTimeout?: number;
  /** Volume threshold to start monitoring (default: 5) */
  volumeThreshold?: number;
  /**
   * Errors for which this returns true are passed to the caller but not
   * counted against the circuit
   */
  errorFilter?: (error: unknown) => boolean;
  /** Custom logger */
  logger?: Logger;
}

// =============================================================================
// CircuitBreaker Class
// =============================================================================

export class CircuitBreaker<TArgs extends unknown[], TResult> {
  private readonly breaker: CircuitBreakerLib<TArgs, TResult>;
  private readonly logger: Logger;

  constructor(
    fn: (...args: TArgs) => Promise<TResult>,
    options: CircuitBreakerOptions
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ circuit: options.name });

    const opossumOptions: CircuitBreakerLib.Options = {
      timeout: options.timeout ?? 10000,
      errorThresholdPercentage: options.errorThresholdPercentage ?? 50,
      resetTimeout: options.resetTimeout ?? 30000,
      volumeThreshold: options.volumeThreshold ?? 5,
      errorFilter: options.errorFilter,
    };

    this.breaker = new CircuitBreakerLib(fn, opossumOptions);
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.breaker.on('timeout', () => {
      this.logger.warn('Circuit breaker call timed out');
    });

    this.breaker.on('reject', () => {
      this.logger.warn('Circuit breaker rejected call (circuit open)');
    });

    this.breaker.on('open', () => {
      this.logger.error(
        { failures: this.breaker.stats.failures },
        'Circuit breaker OPENED - service failures detected'
      );
    });

    this.breaker.on('halfOpen', () => {
      this.logger.info('Circuit breaker HALF-OPEN - testing recovery');
    });

    this.breaker.on('close', () => {
      this.logger.info('Circuit breaker CLOSED - service recovered');
    });
  }

  /**
   * Execute the wrapped function through the circuit breaker
   */
  fire(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  /**
   * Get current circuit state
   */
  getState(): CircuitState {
    if (this.breaker.opened) return 'open';
    if (this.breaker.halfOpen) return 'halfOpen';
    return 'closed';
  }

  /**
   * Shutdown the circuit breaker (cleanup timers)
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}
