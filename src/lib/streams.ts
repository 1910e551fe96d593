import { setInterval } from "node:timers/promises";

import { log } from "../deps.ts";

export async function* just<T>(value: T): AsyncGenerator<T> {
  yield value;
}

export async function* fromTimer(intervalMs: number): AsyncGenerator<void> {
  for await (const _ of setInterval(intervalMs)) {
    yield;
  }
}

export async function* map<T, U>(source: AsyncIterable<T>, mapper: (value: T) => U): AsyncGenerator<U> {
  for await (const value of source) {
    yield mapper(value);
  }
}

/** Interleaves several streams, finishing once all of them have finished. */
export async function* merge<T>(...sources: Array<AsyncIterable<T>>): AsyncGenerator<T> {
  const iterators = sources.map(x => x[Symbol.asyncIterator]());
  const pending = new Map<number, Promise<{ index: number, result: IteratorResult<T> }>>();
  const pull = (index: number) => {
    pending.set(index, iterators[index].next().then(result => ({ index, result })));
  };
  iterators.forEach((_, index) => pull(index));

  try {
    while (pending.size) {
      const { index, result } = await Promise.race(pending.values());
      if (result.done) {
        pending.delete(index);
        continue;
      }
      pull(index);
      yield result.value;
    }
  } finally {
    // unblocked iterators are told to stop; blocked ones finish on their own
    for (const [index] of pending) {
      iterators[index].return?.()
        .catch(err => log.debug(`Merged stream failed to close: ${err instanceof Error ? err.message : String(err)}`));
    }
  }
}

function cancellableDelay(ms: number) {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<void>(ok => { timer = globalThis.setTimeout(ok, ms); });
  return {
    promise,
    cancel: () => clearTimeout(timer),
  };
}

/**
 * Passes through the latest value once the source has been quiet for `quietMs`.
 * A value still waiting when the source ends is emitted immediately.
 */
export async function* debounce<T>(source: AsyncIterable<T>, quietMs: number): AsyncGenerator<T> {
  const iterator = source[Symbol.asyncIterator]();
  let latest: { value: T } | null = null;
  let next = iterator.next();

  while (true) {
    if (!latest) {
      const result = await next;
      if (result.done) return;
      latest = { value: result.value };
      next = iterator.next();
      continue;
    }

    const delay = cancellableDelay(quietMs);
    const result = await Promise.race([next, delay.promise.then(() => null)]);
    delay.cancel();

    if (result == null) {
      const { value } = latest;
      latest = null;
      yield value;
    } else if (result.done) {
      yield latest.value;
      return;
    } else {
      latest = { value: result.value };
      next = iterator.next();
    }
  }
}
