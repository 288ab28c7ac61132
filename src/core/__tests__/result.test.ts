import { describe, it, expect, afterEach, vi } from 'vitest';
import { Err, Ok, TimeoutError, isTimeoutError, safeAsync, toError, withTimeout } from '../result.js';

describe('toError', () => {
  it('keeps Errors and wraps everything else', () => {
    const error = new Error('boom');

    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
  });
});

describe('safeAsync', () => {
  it('captures resolution and rejection', async () => {
    await expect(safeAsync(async () => 42)).resolves.toEqual(Ok(42));
    await expect(safeAsync(async () => Promise.reject(new Error('nope')))).resolves.toEqual(Err(new Error('nope')));
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the value when the operation settles first', async () => {
    await expect(withTimeout(async () => 'done', 1000)).resolves.toEqual({ ok: true, value: 'done' });
  });

  it('fails with a labelled TimeoutError when the timer wins', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<string>(() => {}), 50, 'embedding');

    await vi.advanceTimersByTimeAsync(50);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(isTimeoutError(result.error)).toBe(true);
      expect(result.error.message).toBe('embedding timed out after 50ms');
    }
  });

  it('captures synchronous throws', async () => {
    const result = await withTimeout(() => {
      throw new Error('sync');
    }, 100);

    expect(result).toEqual({ ok: false, error: new Error('sync') });
  });

  it('runs without a timer when the timeout is not positive', async () => {
    const result = await withTimeout(async () => 'untimed', 0);

    expect(result).toEqual({ ok: true, value: 'untimed' });
  });

  it('exposes the configured timeout', () => {
    expect(new TimeoutError(20).timeoutMs).toBe(20);
    expect(new TimeoutError(20).message).toBe('Operation timed out after 20ms');
  });
});
