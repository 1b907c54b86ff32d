import { logger } from '../services/logger.js';

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withPromiseTimeout<T>(promise: Promise<T>, ms: number, errorMessage: string = `Promise timed out after ${ms} ms`): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new TimeoutError(errorMessage));
    }, ms);

    promise.then(
      (res) => {
        clearTimeout(timeoutId);
        resolve(res);
      },
      (err) => {
        clearTimeout(timeoutId);
        reject(err);
      }
    );
  });
}

/**
 * Resolves true if the promise settles within ms, false on timeout. Rejections
 * of the underlying promise are still thrown.
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  try {
    await withPromiseTimeout(promise, ms);
    return true;
  } catch (error) {
    if (error instanceof TimeoutError) {
      return false;
    }
    throw error;
  }
}

/**
 * Run an async mapper over items with at most `limit` in flight. Results keep
 * the input order. A rejected mapper is logged and leaves `fallback` in its
 * slot so one failure does not abort the rest.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>,
  context: string,
  fallback: (item: T) => R
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        results[index] = await mapper(item, index);
      } catch (error) {
        logger.error(
          `Error in parallel operation ${index} of ${context}`,
          context.split(':')[0],
          error instanceof Error ? error : new Error(String(error))
        );
        results[index] = fallback(item);
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
