import { createInterface } from "node:readline";
import { Readable } from "node:stream";

import { Docker, log } from '../deps.ts';

import type { DockerEngineSourceConfig } from "../defs/config.ts";
import type {
  ContainerSnapshot, DnsSource, Endpoint, NetworkAttachment,
  PlainRecordData, ServiceDescriptor, SourceRecord,
} from "../defs/types.ts";

import { setIdentifierAnnotationKey } from "../dns-logic/annotations.ts";
import { endpointsFromContainers } from "../dns-logic/container-endpoints.ts";
import { splitIntoV4andV6 } from "../dns-logic/endpoints.ts";

/** The slice of the Docker Engine API this source needs. */
export interface DockerApi {
  listContainers(filters: Record<string, string[]>): Promise<Array<unknown>>;
  listServices(): Promise<Array<unknown>>;
  info(): Promise<unknown>;
  getEvents(filters: Record<string, string[]>): Promise<AsyncIterable<string | Uint8Array>>;
}

export function dockerApiFromClient(client: Docker): DockerApi {
  return {
    listContainers: filters => client.listContainers({ filters: JSON.stringify(filters) }),
    listServices: () => client.listServices(),
    info: () => client.info(),
    getEvents: filters => client.getEvents({ filters: JSON.stringify(filters) }),
  };
}

// Events which can change the set of published endpoints
const eventFilters = {
  type: ['container', 'service'],
  event: ['start', 'die', 'destroy', 'rename', 'create', 'update', 'remove'],
};

export class DockerEngineSource implements DnsSource {

  constructor(
    public config: DockerEngineSourceConfig,
    private api: DockerApi,
  ) {}

  #swarmManager: Promise<boolean> | null = null;

  async ListRecords() {
    const swarmServices = await this.listSwarmServices();

    const rawContainers = await this.api.listContainers(this.containerFilters());
    const containers = rawContainers.flatMap(x => {
      const snapshot = containerSnapshot(x);
      return snapshot ? [snapshot] : [];
    });
    log.debug(`Docker engine listed ${containers.length} running containers`);

    const endpoints = endpointsFromContainers(containers, {
      swarmMode: swarmServices != null,
      swarmServices,
    });
    return endpoints.flatMap(sourceRecordsForEndpoint);
  }

  async* MakeEventSource(): AsyncGenerator<void> {
    const stream = await this.api.getEvents(eventFilters);
    log.info(`Observing Docker engine events...`);

    const lines = createInterface({ input: Readable.from(stream), crlfDelay: Infinity });
    for await (const line of lines) {
      if (!line.trim()) continue;
      const event = parseEvent(line);
      if (!event) continue;
      log.debug(`Docker ${event.type} event: ${event.action} ${event.actor}`);
      yield;
    }
    log.debug(`Done observing Docker engine events`);
  }

  /** Returns null when swarm grouping is off for this cycle. */
  private async listSwarmServices() {
    if (!await this.isSwarmMode()) return null;

    try {
      const rawServices = await this.api.listServices();
      return serviceDescriptors(rawServices);
    } catch (err) {
      log.warn(`Failed to list swarm services, not grouping by service this time: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  private isSwarmMode(): Promise<boolean> {
    const setting = this.config.swarm_mode ?? false;
    if (setting !== 'auto') return Promise.resolve(setting);

    return this.#swarmManager ??= this.api.info()
      .then(isActiveSwarmManager)
      .then(isManager => {
        log.info(`Docker engine ${isManager ? 'is' : 'is not'} an active swarm manager`);
        return isManager;
      })
      .catch(err => {
        this.#swarmManager = null; // ask again next cycle
        log.warn(`Failed to inspect Docker engine for swarm mode: ${err instanceof Error ? err.message : String(err)}`);
        return false;
      });
  }

  private containerFilters() {
    const filters: Record<string, string[]> = {
      status: ['running'],
    };
    const labels = Object.entries(this.config.label_filter ?? {});
    if (labels.length) {
      filters.label = labels.map(([key, value]) => `${key}=${value}`);
    }
    return filters;
  }
}

//------------
// Narrowing of Docker Engine API payloads

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value == 'object' && value != null && !Array.isArray(value);
}

function stringMap(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const map: Record<string, string> = {};
  for (const [key, val] of Object.entries(value)) {
    if (typeof val == 'string') map[key] = val;
  }
  return map;
}

export function containerSnapshot(raw: unknown): ContainerSnapshot | null {
  if (!isRecord(raw)) return null;

  const networks: Record<string, NetworkAttachment> = {};
  const settings = isRecord(raw.NetworkSettings) ? raw.NetworkSettings : {};
  if (isRecord(settings.Networks)) {
    for (const [name, network] of Object.entries(settings.Networks)) {
      if (!isRecord(network)) continue;
      networks[name] = {
        ipAddress: typeof network.IPAddress == 'string' ? network.IPAddress : '',
        gateway: typeof network.Gateway == 'string' ? network.Gateway : '',
      };
    }
  }

  return {
    labels: stringMap(raw.Labels),
    networks,
  };
}

export function serviceDescriptors(rawServices: Array<unknown>) {
  const services = new Map<string, ServiceDescriptor>();
  for (const raw of rawServices) {
    if (!isRecord(raw) || typeof raw.ID != 'string') continue;
    const spec = isRecord(raw.Spec) ? raw.Spec : {};
    const mode = isRecord(spec.Mode) ? spec.Mode : {};
    const endpoint = isRecord(raw.Endpoint) ? raw.Endpoint : {};

    services.set(raw.ID, {
      id: raw.ID,
      name: typeof spec.Name == 'string' ? spec.Name : undefined,
      mode: 'Global' in mode ? 'global' : 'replicated',
      ports: (Array.isArray(endpoint.Ports) ? endpoint.Ports : [])
        .flatMap(port => isRecord(port) && typeof port.TargetPort == 'number' ? [{
          protocol: typeof port.Protocol == 'string' ? port.Protocol : 'tcp',
          targetPort: port.TargetPort,
          publishedPort: typeof port.PublishedPort == 'number' ? port.PublishedPort : undefined,
        }] : []),
    });
  }
  return services;
}

export function isActiveSwarmManager(info: unknown) {
  if (!isRecord(info) || !isRecord(info.Swarm)) return false;
  return info.Swarm.LocalNodeState === 'active'
    && info.Swarm.ControlAvailable === true;
}

function parseEvent(line: string) {
  let event: unknown;
  try {
    event = JSON.parse(line);
  } catch (err) {
    log.warn(`Ignoring unparsable Docker event: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
  if (!isRecord(event)) return null;
  const actor = isRecord(event.Actor) ? event.Actor : {};
  return {
    type: typeof event.Type == 'string' ? event.Type : 'unknown',
    action: typeof event.Action == 'string' ? event.Action : 'unknown',
    actor: typeof actor.ID == 'string' ? actor.ID : '',
  };
}

//------------
// Hand-off to the controller's record shape

export function sourceRecordsForEndpoint(endpoint: Endpoint): SourceRecord[] {
  const records: PlainRecordData[] = endpoint.recordType == 'CNAME'
    ? endpoint.targets.map(target => ({ type: 'CNAME', target }))
    : splitIntoV4andV6(endpoint.targets);

  // "provider specific" maps directly to annotations
  const annotations = { ...endpoint.providerSpecific };
  if (endpoint.setIdentifier) {
    annotations[setIdentifierAnnotationKey] = endpoint.setIdentifier;
  }

  return records.map(record => ({
    resourceKey: `docker/${endpoint.dnsName}`,
    annotations,
    dns: {
      fqdn: endpoint.dnsName,
      ttl: endpoint.recordTTL || null,
      ...record,
    },
  }));
}
