import { test } from "node:test";
import { deepEqual } from "node:assert/strict";

import { createTickStream } from "./ticks.ts";

test('--once produces a single startup tick', async () => {
  const ticks = new Array<string | null>();
  for await (const tick of createTickStream({ source: [], debounce_seconds: 0.01 }, [], ['--once'])) {
    ticks.push(tick);
  }
  deepEqual(ticks, [null]);
});
