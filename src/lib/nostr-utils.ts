import { getTagValue } from "applesauce-core/helpers";
import type { NostrEvent } from "nostr-tools";
import { isParameterizedReplaceableKind } from "./nostr-kinds";

export function getTagValues(event: NostrEvent, tagName: string): string[] {
  return event.tags
    .filter((tag) => tag[0] === tagName && tag[1])
    .map((tag) => tag[1]);
}

/**
 * Build an address coordinate: "kind:pubkey:d"
 */
export function buildAddress(kind: number, pubkey: string, d = ""): string {
  return `${kind}:${pubkey}:${d}`;
}

/**
 * Address of a replaceable or parameterized replaceable event.
 * Returns null for parameterized kinds without a d-tag.
 */
export function getEventAddress(event: NostrEvent): string | null {
  if (!isParameterizedReplaceableKind(event.kind)) {
    return buildAddress(event.kind, event.pubkey);
  }

  const d = getTagValue(event, "d");
  if (d === undefined) return null;
  return buildAddress(event.kind, event.pubkey, d);
}

/**
 * Parse "kind:pubkey:d". The d part may itself contain colons.
 */
export function parseAddress(
  coordinate: string,
): { kind: number; pubkey: string; identifier: string } | null {
  const [kindPart, pubkey, ...rest] = coordinate.split(":");
  const kind = Number(kindPart);

  if (!kindPart || !Number.isInteger(kind) || kind < 0) return null;
  if (!pubkey || rest.length === 0) return null;

  return { kind, pubkey, identifier: rest.join(":") };
}

export function shortKey(pubkey: string): string {
  return pubkey.slice(0, 8);
}
