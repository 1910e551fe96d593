/** Annotation prefix shared with external-dns, so existing labels keep working. */
export const annotationPrefix = 'external-dns.alpha.kubernetes.io/';

export const hostnameAnnotationKey = `${annotationPrefix}hostname`;
export const targetAnnotationKey = `${annotationPrefix}target`;
export const ttlAnnotationKey = `${annotationPrefix}ttl`;
export const setIdentifierAnnotationKey = `${annotationPrefix}set-identifier`;
export const aliasAnnotationKey = `${annotationPrefix}alias`;
export const cloudflareProxiedAnnotationKey = `${annotationPrefix}cloudflare-proxied`;

export const networkAnnotationKey = 'external-dns/network';
export const composeServiceLabelKey = 'com.docker.compose.service';
export const swarmServiceIdLabelKey = 'com.docker.swarm.service.id';
export const swarmServiceNameLabelKey = 'com.docker.swarm.service.name';

const maxTtl = 2 ** 31 - 1;

type Labels = Readonly<Record<string, string>>;

export class AnnotationParseError extends Error {
  constructor(
    public readonly key: string,
    public readonly value: string,
    reason: string,
  ) {
    super(`Label ${key}="${value}" ${reason}`);
    this.name = 'AnnotationParseError';
  }
}

function splitList(raw: string | undefined) {
  if (!raw) return [];
  return raw.split(',')
    .map(x => x.trim())
    .filter(x => x.length > 0);
}

export function hostnames(labels: Labels): string[] {
  return splitList(labels[hostnameAnnotationKey])
    .map(x => x.replace(/\.$/, ''));
}

/** @throws AnnotationParseError when the label is present but not a usable TTL */
export function ttl(labels: Labels): number | null {
  const rawVal = labels[ttlAnnotationKey];
  if (rawVal === undefined) return null;
  if (!/^\d+$/.test(rawVal.trim())) {
    throw new AnnotationParseError(ttlAnnotationKey, rawVal, 'is not a non-negative integer');
  }
  const value = parseInt(rawVal, 10);
  if (value > maxTtl) {
    throw new AnnotationParseError(ttlAnnotationKey, rawVal, `must not exceed ${maxTtl}`);
  }
  return value;
}

export function explicitTargets(labels: Labels): string[] {
  return splitList(labels[targetAnnotationKey]);
}

export function providerSpecific(labels: Labels): {
  options: Record<string, string>;
  setIdentifier: string | null;
} {
  const options = new Array<[string, string]>();
  for (const [key, value] of Object.entries(labels)) {
    if (key == aliasAnnotationKey) {
      if (value == 'true') options.push(['alias', 'true']);
    } else if (key == cloudflareProxiedAnnotationKey) {
      options.push([key, value]);
    } else if (key.startsWith(`${annotationPrefix}aws-`)) {
      options.push([`aws/${key.slice(annotationPrefix.length + 4)}`, value]);
    } else if (key.startsWith(`${annotationPrefix}scw-`)) {
      options.push([`scw/${key.slice(annotationPrefix.length + 4)}`, value]);
    }
  }
  // label maps have no inherent order
  options.sort((a, b) => a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);

  return {
    options: Object.fromEntries(options),
    setIdentifier: labels[setIdentifierAnnotationKey] || null,
  };
}

export function preferredNetwork(labels: Labels) {
  const name = labels[networkAnnotationKey];
  return name === undefined
    ? { name: '', present: false }
    : { name, present: true };
}

export function composeServiceName(labels: Labels) {
  return labels[composeServiceLabelKey] || null;
}

export function swarmServiceId(labels: Labels) {
  return labels[swarmServiceIdLabelKey] || null;
}
