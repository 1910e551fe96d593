import type { NetworkAttachment } from "../defs/types.ts";

/**
 * Picks the container address to publish when no explicit target is set.
 * A preferred network is used strictly: if the container isn't attached to it,
 * nothing is returned. Without a preference, only a container on exactly one
 * network has an unambiguous address.
 */
export function networkTargets(
  networks: Readonly<Record<string, NetworkAttachment>>,
  preferred: { name: string, present: boolean },
): string[] {
  let attachment: NetworkAttachment | undefined;
  if (preferred.present) {
    attachment = Object.hasOwn(networks, preferred.name)
      ? networks[preferred.name]
      : undefined;
  } else {
    const attachments = Object.values(networks);
    if (attachments.length == 1) attachment = attachments[0];
  }

  if (!attachment?.ipAddress) return [];
  return [attachment.ipAddress];
}
