import { getTagValue } from "applesauce-core/helpers";
import type { NostrEvent } from "nostr-tools";
import { GENERIC_REPOST_KIND, REPOST_KIND } from "@/constants/kinds";
import type { RepostPayload } from "@/types/reconcile";

/**
 * Parse a kind 6 or kind 16 repost (NIP-18)
 *
 * Addressable targets are identified by their `a` coordinate so that a new
 * version of the same video still reads as reposted.
 */
export function getRepostTarget(event: NostrEvent): RepostPayload | null {
  if (event.kind !== REPOST_KIND && event.kind !== GENERIC_REPOST_KIND) {
    return null;
  }

  const address = getTagValue(event, "a");
  const eventId = getTagValue(event, "e");

  if (address) {
    return eventId ? { target: address, eventId } : { target: address };
  }
  if (eventId) return { target: eventId, eventId };
  return null;
}
