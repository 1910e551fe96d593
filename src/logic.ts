import type { DnsSource, SourceRecord } from "./defs/types.ts";

import { printRecords } from "./lib/printing.ts";
import { log } from "./deps.ts";

export async function mainLoopIteration(
  sources: Array<DnsSource>,
) {
  const sourceRecords = await loadSourceEndpoints(sources);
  printRecords(sourceRecords);
  return sourceRecords;
}

export async function loadSourceEndpoints(sources: Array<DnsSource>) {
  log.debug(`Loading desired records from ${sources.length} sources...`);
  const sourceRecords: SourceRecord[] = await Promise.all(sources.map(async source => {
    const endpoints = await source.ListRecords().catch(err => {
      log.error(`Source "${source.config.type}" failed to ListRecords`);
      throw err;
    });
    log.info(`Discovered ${endpoints.length} desired records from ${source.config.type}`);
    return endpoints;
  })).then(x => x.flat());
  log.debug(`Discovered ${sourceRecords.length} desired records overall`);
  return sourceRecords;
}
