import { FetchResult, fail } from '../types/index.js';

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Resolve to a `timeout` failure if the call has not settled in time.
 * The underlying call is not cancelled; its late result is dropped.
 */
export async function withTimeout<T>(
  call: Promise<FetchResult<T>>,
  timeoutMs: number,
  label: string
): Promise<FetchResult<T>> {
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<FetchResult<T>>(resolve => {
    timer = setTimeout(
      () => resolve(fail('timeout', `${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([call, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Serializes async tasks: each task starts after the previous one settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    try {
      return await run;
    } finally {
      this.pending--;
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
