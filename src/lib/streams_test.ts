import { test } from "node:test";
import { deepEqual } from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";

import { debounce, just, map, merge } from "./streams.ts";

async function collect<T>(source: AsyncIterable<T>) {
  const values = new Array<T>();
  for await (const value of source) values.push(value);
  return values;
}

async function* fromArray<T>(values: T[]) {
  for (const value of values) yield value;
}

test('merge passes along every value', async () => {
  const values = await collect(merge(fromArray(['a', 'b']), just('c'), fromArray<string>([])));
  deepEqual(values.sort(), ['a', 'b', 'c']);
});

test('map transforms each value', async () => {
  deepEqual(await collect(map(fromArray([1, 2]), x => x * 10)), [10, 20]);
});

test('debounce keeps the latest value of each burst', async () => {
  async function* bursts() {
    yield 1;
    yield 2;
    await sleep(150);
    yield 3;
  }
  deepEqual(await collect(debounce(bursts(), 20)), [2, 3]);
});

test('debounce of an empty stream', async () => {
  deepEqual(await collect(debounce(fromArray([]), 20)), []);
});
