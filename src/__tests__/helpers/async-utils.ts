/**
 * Async testing utilities for ordering and timing-based tests
 */

/**
 * Creates a promise that resolves after the specified time
 * @param ms Time to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Lets every queued promise callback run
 */
export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
}

/**
 * Creates a deferred promise that can be resolved or rejected externally
 */
export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T | PromiseLike<T>) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

/**
 * Tracks the order of events for ordering assertions
 */
export class ExecutionTracker {
  private events: string[] = [];

  record(name: string): void {
    this.events.push(name);
  }

  getEvents(): string[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
  }
}
