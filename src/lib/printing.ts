import type { BaseRecord, SourceRecord } from "../defs/types.ts";
import { log } from "../deps.ts";

export function printRecord(record: BaseRecord) {
  const bits = [
    `ttl=${record.dns.ttl ?? 'default'}`,
    `data=${record.dns.target}`,
  ];
  return `    ${record.dns.type} ${record.dns.fqdn} ${bits.join(' ')}`;
}

/** Renders desired records grouped by name, in the order they were produced. */
export function formatRecords(records: ReadonlyArray<SourceRecord>) {
  const byName = new Map<string, Array<SourceRecord>>();
  for (const record of records) {
    const list = byName.get(record.dns.fqdn) ?? [];
    list.push(record);
    byName.set(record.dns.fqdn, list);
  }

  return Array.from(byName, ([fqdn, list]) => [
    `For ${fqdn} :`,
    ...list.map(printRecord),
  ].join('\n'));
}

export function printRecords(records: ReadonlyArray<SourceRecord>) {
  log.debug(`Printing ${records.length} desired records`);
  for (const block of formatRecords(records)) {
    log.info(block + '\n');
  }
}
