/**
 * Minimal task helpers. A task is a function of a cancellation signal returning a promise;
 * cancellation is cooperative and rejects with the signal's reason.
 */

export type Task<T> = (signal: AbortSignal) => Promise<T>;

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  delayMs: number;
  /** Return false to stop retrying and rethrow immediately (default: retry everything) */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('task cancelled');
}

/** Resolve after `ms`, or reject as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('task cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` until it resolves, up to `attempts` times, waiting `delayMs` between attempts.
 * The last error is rethrown once attempts are exhausted.
 */
export async function retry<T>(task: Task<T>, opts: RetryOptions): Promise<T> {
  const signal = opts.signal ?? new AbortController().signal;
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    if (signal.aborted) throw abortReason(signal);
    try {
      return await task(signal);
    } catch (err) {
      lastError = err;
      if (opts.shouldRetry && !opts.shouldRetry(err)) throw err;
      if (attempt < opts.attempts) await delay(opts.delayMs, signal);
    }
  }

  throw lastError;
}
