/**
 * CircuitBreaker Unit Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CircuitBreaker, type CircuitBreakerOptions } from '../../../src/resilience/CircuitBreaker.js';
import { createLogger } from '../../../src/utils/logger.js';

const silent = createLogger({ level: 'silent' });

function options(overrides: Partial<CircuitBreakerOptions> = {}): CircuitBreakerOptions {
  return { name: 'test', logger: silent, ...overrides };
}

describe('CircuitBreaker', () => {
  let circuit: CircuitBreaker<[string], string> | undefined;

  afterEach(() => {
    circuit?.shutdown();
    circuit = undefined;
    vi.useRealTimers();
  });

  it('executes the wrapped function', async () => {
    const fn = vi.fn(async (arg: string) => `got ${arg}`);
    circuit = new CircuitBreaker(fn, options());

    await expect(circuit.fire('a')).resolves.toBe('got a');
    expect(fn).toHaveBeenCalledWith('a');
  });

  it('propagates errors without opening below the volume threshold', async () => {
    circuit = new CircuitBreaker(
      vi.fn(async (_arg: string): Promise<string> => {
        throw new Error('API Error');
      }),
      options({ volumeThreshold: 10 })
    );

    await expect(circuit.fire('x')).rejects.toThrow('API Error');
    await expect(circuit.fire('x')).rejects.toThrow('API Error');

    expect(circuit.getState()).toBe('closed');
  });

  it('passes filtered errors through without counting them', async () => {
    const fn = vi.fn(async (arg: string): Promise<string> => {
      throw new Error(arg);
    });
    circuit = new CircuitBreaker(
      fn,
      options({
        volumeThreshold: 2,
        errorFilter: (error) => error instanceof Error && error.message === 'caller mistake',
      })
    );

    for (let i = 0; i < 4; i++) {
      await expect(circuit.fire('caller mistake')).rejects.toThrow('caller mistake');
    }
    expect(circuit.getState()).toBe('closed');
    expect(fn).toHaveBeenCalledTimes(4);

    // Filtered calls count as successes: 4 of 8 failed is not above 50%, 5 of 9 is
    for (let i = 0; i < 4; i++) {
      await expect(circuit.fire('outage')).rejects.toThrow('outage');
    }
    expect(circuit.getState()).toBe('closed');

    await expect(circuit.fire('outage')).rejects.toThrow('outage');
    expect(circuit.getState()).toBe('open');
  });

  it('opens after the threshold and rejects without calling through', async () => {
    const fn = vi.fn(async (_arg: string): Promise<string> => {
      throw new Error('fail');
    });
    circuit = new CircuitBreaker(fn, options({ volumeThreshold: 2 }));

    await expect(circuit.fire('x')).rejects.toThrow('fail');
    await expect(circuit.fire('x')).rejects.toThrow('fail');
    expect(circuit.getState()).toBe('open');

    await expect(circuit.fire('x')).rejects.toThrow('Breaker is open');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('half-opens after the reset timeout and closes on success', async () => {
    vi.useFakeTimers();
    let healthy = false;
    circuit = new CircuitBreaker(
      async (_arg: string) => {
        if (!healthy) {
          throw new Error('down');
        }
        return 'up';
      },
      options({ volumeThreshold: 1, resetTimeout: 1000, timeout: false })
    );

    await expect(circuit.fire('x')).rejects.toThrow('down');
    expect(circuit.getState()).toBe('open');

    vi.advanceTimersByTime(1000);
    expect(circuit.getState()).toBe('halfOpen');

    healthy = true;
    await expect(circuit.fire('x')).resolves.toBe('up');
    expect(circuit.getState()).toBe('closed');
  });

  it('times out slow calls', async () => {
    vi.useFakeTimers();
    circuit = new CircuitBreaker(
      (_arg: string) => new Promise<string>(() => {}),
      options({ timeout: 50, volumeThreshold: 10 })
    );

    const pending = circuit.fire('x');
    const assertion = expect(pending).rejects.toThrow('Timed out after 50ms');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });
});
