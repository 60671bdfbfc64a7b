/* packages/core/test/timing.spec.ts */
import { describe, it, expect } from 'vitest';
import { CancelledError, TimeoutError, median, relativeSpread, withTimeout } from '../src';

describe('median / relativeSpread', () => {
  it('takes the middle value', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });

  it('measures spread relative to the median', () => {
    expect(relativeSpread([10])).toBe(0);
    expect(relativeSpread([9, 10, 12])).toBeCloseTo(0.3, 10);
    expect(relativeSpread([0, 0, 0])).toBe(0);
  });
});

describe('withTimeout', () => {
  it('returns the task result', async () => {
    await expect(withTimeout('lookup', 1000, async () => 42)).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the task signal', async () => {
    let seen: AbortSignal | undefined;
    const p = withTimeout('lookup', 10, (signal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    });
    await expect(p).rejects.toBeInstanceOf(TimeoutError);
    await expect(p).rejects.toThrow('lookup timed out after 10 ms');
    expect(seen?.aborted).toBe(true);
  });

  it('does not start when the caller already gave up', async () => {
    const ctl = new AbortController();
    ctl.abort();
    let started = false;
    const p = withTimeout('lookup', 1000, async () => {
      started = true;
      return 1;
    }, ctl.signal);
    await expect(p).rejects.toBeInstanceOf(CancelledError);
    expect(started).toBe(false);
  });

  it('turns a caller abort into CancelledError', async () => {
    const ctl = new AbortController();
    const p = withTimeout('lookup', 1000, () => new Promise<never>(() => undefined), ctl.signal);
    ctl.abort();
    await expect(p).rejects.toThrow('request cancelled by caller');
  });
});
