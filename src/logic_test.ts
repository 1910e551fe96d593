import { test } from "node:test";
import { deepEqual, rejects } from "node:assert/strict";

import type { DnsSource, SourceRecord } from "./defs/types.ts";
import { loadSourceEndpoints, mainLoopIteration } from "./logic.ts";
import { setupLogs } from "./deps.ts";

setupLogs({ logLevel: 'error', logFormat: 'json' });

class StaticSource implements DnsSource {
  config = { type: 'static' };
  constructor(private records: SourceRecord[] | Error) {}
  async ListRecords() {
    if (this.records instanceof Error) throw this.records;
    return this.records;
  }
  async* MakeEventSource(): AsyncGenerator<void> {}
}

const record = (fqdn: string, target: string): SourceRecord => ({
  resourceKey: `docker/${fqdn}`,
  annotations: {},
  dns: { fqdn, type: 'A', target, ttl: null },
});

test('records from every source are combined in order', async () => {
  const first = new StaticSource([record('a.example.local', '192.0.2.1')]);
  const second = new StaticSource([record('b.example.local', '192.0.2.2'), record('b.example.local', '192.0.2.3')]);

  const sourceRecords = await loadSourceEndpoints([first, second]);
  deepEqual(sourceRecords.map(x => x.dns.target), ['192.0.2.1', '192.0.2.2', '192.0.2.3']);

  deepEqual(await mainLoopIteration([first]), [record('a.example.local', '192.0.2.1')]);
});

test('a failing source fails the iteration', async () => {
  await rejects(mainLoopIteration([
    new StaticSource([]),
    new StaticSource(new Error('engine unreachable')),
  ]), /engine unreachable/);
});
