import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSemaphore, withTimeout } from './concurrency.js';
import { InvalidConfigurationError, ProviderTimeoutError } from './errors.js';

describe('createSemaphore', () => {
  it('should reject a non-positive limit', () => {
    expect(() => createSemaphore(0)).toThrow(InvalidConfigurationError);
    expect(() => createSemaphore(1.5)).toThrow(InvalidConfigurationError);
  });

  it('should never run more tasks than the limit at once', async () => {
    const semaphore = createSemaphore(2);
    let running = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(task)));

    expect(peak).toBe(2);
    expect(semaphore.active).toBe(0);
    expect(semaphore.pending).toBe(0);
  });

  it('should release the slot when a task throws', async () => {
    const semaphore = createSemaphore(1);
    await expect(semaphore.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    const result = await semaphore.run(() => Promise.resolve('next'));
    expect(result).toBe('next');
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the value when the promise settles first', async () => {
    const result = await withTimeout(Promise.resolve(42), 100, () => new Error('late'));
    expect(result).toBe(42);
  });

  it('should reject with the timeout error when the timer fires first', async () => {
    vi.useFakeTimers();
    const never = new Promise<number>(() => undefined);
    const pending = withTimeout(never, 50, () => new ProviderTimeoutError('llm', 50));
    const assertion = expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });
});
