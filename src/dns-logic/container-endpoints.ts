import { log } from "../deps.ts";
import type {
  ContainerSnapshot, Endpoint, ServiceDescriptor,
} from "../defs/types.ts";

import { OrderedGroups } from "../lib/ordered-groups.ts";
import * as annotations from "./annotations.ts";
import { endpointForHostname } from "./endpoints.ts";
import { networkTargets } from "./network-target.ts";

/** Everything one container contributes while its group is still being collected. */
export interface PendingContainerState {
  readonly ttl: number | null;
  readonly targets: ReadonlyArray<string>;
  /** Set when the targets came from the container's own network address */
  readonly hasFallbackTarget: boolean;
  readonly providerSpecific: Readonly<Record<string, string>>;
  readonly setIdentifier: string | null;
  readonly labels: Readonly<Record<string, string>>;
}

export interface WarningSink {
  warn(message: string): void;
}

export interface ContainerEndpointOptions {
  /** Whether swarm service labels form groups at all */
  swarmMode: boolean;
  /** Services known to the swarm manager, keyed by service ID */
  swarmServices?: ReadonlyMap<string, ServiceDescriptor> | null;
  logger?: WarningSink;
}

/**
 * Builds the pending state for one container.
 * Returns null when the container has no target and so isn't exposed.
 * @throws AnnotationParseError on a malformed TTL label
 */
export function pendingStateFor(container: ContainerSnapshot): PendingContainerState | null {
  const { labels } = container;
  const ttl = annotations.ttl(labels);

  let targets = annotations.explicitTargets(labels);
  let hasFallbackTarget = false;
  if (targets.length == 0) {
    targets = networkTargets(container.networks, annotations.preferredNetwork(labels));
    hasFallbackTarget = targets.length > 0;
  }
  if (targets.length == 0) return null;

  const { options, setIdentifier } = annotations.providerSpecific(labels);
  return {
    ttl,
    targets,
    hasFallbackTarget,
    providerSpecific: options,
    setIdentifier,
    labels,
  };
}

/**
 * Folds a group into its first member.
 * Siblings only add targets when those came from their network address,
 * since an explicit target is the same for every replica.
 */
export function mergeGroup(members: ReadonlyArray<PendingContainerState>): PendingContainerState | null {
  const [representative, ...siblings] = members;
  if (!representative) return null;
  return siblings.reduce<PendingContainerState>((merged, sibling) =>
    sibling.hasFallbackTarget
      ? { ...merged, targets: [...merged.targets, ...sibling.targets] }
      : merged,
    representative);
}

function endpointsForState(state: PendingContainerState): Endpoint[] {
  return annotations.hostnames(state.labels).map(hostname =>
    endpointForHostname(hostname, state.targets, state.ttl,
      state.providerSpecific, state.setIdentifier));
}

export function endpointsFromContainers(
  containers: ReadonlyArray<ContainerSnapshot>,
  opts: ContainerEndpointOptions,
): Endpoint[] {
  const logger: WarningSink = opts.logger ?? log;
  const endpoints = new Array<Endpoint>();
  const composeGroups = new OrderedGroups<string, PendingContainerState>();
  const swarmGroups = new OrderedGroups<string, PendingContainerState>();

  for (const container of containers) {
    let state: PendingContainerState | null;
    try {
      state = pendingStateFor(container);
    } catch (err) {
      if (!(err instanceof annotations.AnnotationParseError)) throw err;
      logger.warn(`Skipping container: ${err.message}`);
      continue;
    }
    if (!state) continue;

    const swarmServiceId = opts.swarmMode
      ? annotations.swarmServiceId(state.labels)
      : null;
    const composeService = annotations.composeServiceName(state.labels);

    if (swarmServiceId) {
      swarmGroups.add(swarmServiceId, state);
    } else if (composeService) {
      composeGroups.add(composeService, state);
    } else {
      endpoints.push(...endpointsForState(state));
    }
  }

  for (const [, members] of composeGroups) {
    const merged = mergeGroup(members);
    if (merged) endpoints.push(...endpointsForState(merged));
  }

  for (const [serviceId, members] of swarmGroups) {
    // the swarm manager doesn't know this service (yet), so don't publish it
    if (!opts.swarmServices?.has(serviceId)) continue;
    const merged = mergeGroup(members);
    if (merged) endpoints.push(...endpointsForState(merged));
  }

  return endpoints;
}
