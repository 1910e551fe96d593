// Source defines the interface Endpoint sources should implement.
export interface DnsSource {
  config: {type: string};
  ListRecords(): Promise<Array<SourceRecord>>;
  // MakeEventSource yields once every time something in the source changes
  MakeEventSource(): AsyncGenerator<void>;
}

export interface SourceRecord extends BaseRecord {
  /** Composite string identifying where this bundle came from */
  resourceKey: string;
  /** Container labels and provider-specific options, for filtering and extra behavior */
  annotations: Record<string, string>;
}
export interface BaseRecord {
  /** The actual DNS data */
  dns: PlainRecord;
}

export type PlainRecord = {
  fqdn: string;
  ttl?: number | null;
} & PlainRecordData;

export type PlainRecordData =
  | PlainRecordAddress
  | PlainRecordHostname
;

export type PlainRecordAddress = {
  type: 'A' | 'AAAA';
  target: string;
}

export type PlainRecordHostname = {
  type: 'CNAME';
  target: string;
}

//------------
// Container runtime snapshot, as handed to the endpoint logic

export interface NetworkAttachment {
  ipAddress: string;
  gateway: string;
}

export interface ContainerSnapshot {
  labels: Readonly<Record<string, string>>;
  networks: Readonly<Record<string, NetworkAttachment>>;
}

/** Swarm service metadata. Only its presence is checked. */
export interface ServiceDescriptor {
  id: string;
  name?: string;
  mode?: 'replicated' | 'global';
  ports?: Array<{ protocol: string; targetPort: number; publishedPort?: number }>;
}

//------------
// Endpoint records, as handed to the record synchronization controller

export type EndpointRecordType = 'A' | 'AAAA' | 'CNAME';

export interface Endpoint {
  dnsName: string;
  targets: string[];
  recordType: EndpointRecordType;
  /** Empty when no set identifier was requested */
  setIdentifier: string;
  /** Zero when no TTL was requested */
  recordTTL: number;
  providerSpecific: Record<string, string>;
  labels: Record<string, string>;
}
