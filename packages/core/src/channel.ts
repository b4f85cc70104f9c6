/**
 * Lazy sequences between pipeline stages.
 * @module channel
 */

import { abortError } from './errors.js';

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Unbounded FIFO queue with a single consumer side.
 *
 * Producers `push` values as they arrive from a callback-style source (a
 * socket, a child process) and the consumer pulls them in arrival order.
 * Once closed, buffered values are still delivered before `done`. A failed
 * channel delivers its buffered values, then rejects.
 *
 * @example
 * ```typescript
 * const events = new Channel<TranscriptEvent>();
 * socket.on('message', (msg) => events.push(parse(msg)));
 * socket.on('close', () => events.close());
 *
 * for await (const event of events) {
 *   console.log(event.text);
 * }
 * ```
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private ended = false;
  private failure: { error: unknown } | null = null;

  /** True once `close` or `fail` has been called */
  get closed(): boolean {
    return this.ended;
  }

  /** Number of values waiting to be pulled */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Append a value. Returns false if the channel is already closed, in which
   * case the value is dropped.
   */
  push(value: T): boolean {
    if (this.ended) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** End the sequence after the buffered values. */
  close(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  /** End the sequence with an error, raised after the buffered values. */
  fail(error: unknown): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  /**
   * Wait for the next value. Rejects with an `AbortError` as soon as the
   * signal fires, even when a value is buffered.
   */
  pull(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve: (result) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        if (signal) reject(abortError(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Iterate until the channel ends or the signal fires.
   */
  async *iterate(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.pull(signal);
      if (result.done) return;
      yield result.value;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.pull(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

/**
 * Iterate any async iterable, giving up as soon as the signal fires.
 *
 * The pending `next()` of the source is abandoned rather than awaited, so a
 * source blocked on the network cannot hold up cancellation. The source's
 * `return()` is still invoked so it can release what it holds.
 */
export async function* abortable<T>(
  source: AsyncIterable<T>,
  signal?: AbortSignal
): AsyncGenerator<T, void, undefined> {
  if (!signal) {
    yield* source;
    return;
  }

  const iterator = source[Symbol.asyncIterator]();
  let finished = false;
  try {
    while (true) {
      const result = await raceAbort(iterator.next(), signal);
      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!finished && iterator.return) {
      iterator.return().catch(() => undefined);
    }
  }
}

/**
 * Settle with the promise, or reject with an `AbortError` once the signal
 * fires, whichever comes first.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(abortError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Create a controller that aborts when any of the given signals does.
 * Call `dispose` to detach from the parents once the child is no longer used.
 */
export function linkedController(...parents: Array<AbortSignal | undefined>): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detach.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const remove of detach.splice(0)) remove();
    },
  };
}

/**
 * Resolve after `ms` milliseconds, or reject early when the signal fires.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  const timer = new Promise<void>((resolve) => {
    const handle = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => clearTimeout(handle), { once: true });
  });
  return signal ? raceAbort(timer, signal) : timer;
}
