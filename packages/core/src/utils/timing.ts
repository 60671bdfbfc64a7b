import { CancelledError, TimeoutError } from '../errors';

/**
 * Races `task` against a timer. The task receives an AbortSignal that fires on
 * timeout or when the caller's `signal` aborts, so clients that accept one can
 * stop their own work.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) throw new CancelledError();

  const ctl = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ctl.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    if (signal) {
      onAbort = () => {
        ctl.abort();
        reject(new CancelledError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(ctl.signal), guard]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const xs = [...values].sort((a, b) => a - b);
  const mid = Math.floor(xs.length / 2);
  return xs.length % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2;
}

/** (max - min) / median; 0 for fewer than two samples or a zero median. */
export function relativeSpread(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = median(values);
  if (m <= 0) return 0;
  return (Math.max(...values) - Math.min(...values)) / m;
}
