import { isIPv4, isIPv6 } from "node:net";

import type {
  Endpoint, EndpointRecordType, PlainRecordAddress,
} from "../defs/types.ts";

export function isIPv4Literal(target: string) {
  return isIPv4(target);
}

export function isIPv6Literal(target: string) {
  return isIPv6(target);
}

export function splitIntoV4andV6(targets: string[]): PlainRecordAddress[] {
  const endpoints = new Array<PlainRecordAddress>();
  for (const target of targets) {
    if (isIPv6Literal(target)) {
      endpoints.push({ type: 'AAAA', target });
    } else if (isIPv4Literal(target)) {
      endpoints.push({ type: 'A', target });
    }
  }
  return endpoints;
}

/**
 * Address records need every target to be an IP literal.
 * Anything else names another host, so the record becomes a CNAME.
 *
 * `A` here means "address record, possibly mixed family": a list holding both
 * IPv4 and IPv6 literals stays one `A` endpoint carrying both. Only an all-IPv6
 * list is `AAAA`. Use {@link splitIntoV4andV6} to get per-family records.
 */
export function inferRecordType(targets: ReadonlyArray<string>): EndpointRecordType {
  if (targets.length == 0) throw new Error(`Cannot infer a record type without targets`);
  if (targets.every(isIPv6Literal)) return 'AAAA';
  if (targets.every(x => isIPv4Literal(x) || isIPv6Literal(x))) return 'A';
  return 'CNAME';
}

/**
 * CNAMEs carry exactly one target: the first entry that isn't an IP literal.
 * Address records keep every target, in order.
 */
export function recordTargets(recordType: EndpointRecordType, targets: ReadonlyArray<string>) {
  if (recordType != 'CNAME') return [...targets];
  const alias = targets.find(x => !isIPv4Literal(x) && !isIPv6Literal(x));
  return alias ? [alias] : [];
}

export function endpointForHostname(
  hostname: string,
  targets: ReadonlyArray<string>,
  ttl: number | null,
  providerSpecific: Readonly<Record<string, string>>,
  setIdentifier: string | null,
): Endpoint {
  const recordType = inferRecordType(targets);
  return {
    dnsName: hostname,
    targets: recordTargets(recordType, targets),
    recordType,
    setIdentifier: setIdentifier ?? '',
    recordTTL: ttl ?? 0,
    providerSpecific: { ...providerSpecific },
    labels: {},
  };
}
