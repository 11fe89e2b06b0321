import type { NostrEvent } from "nostr-tools";
import { DELETION_KIND } from "@/constants/kinds";
import { getTagValues, parseAddress } from "./nostr-utils";

/**
 * Event ids a kind 5 deletion request refers to
 */
export function getDeletedEventIds(event: NostrEvent): string[] {
  if (event.kind !== DELETION_KIND) return [];
  return getTagValues(event, "e");
}

/**
 * Well-formed `a` coordinates a kind 5 deletion request refers to
 */
export function getDeletedAddresses(
  event: NostrEvent,
): Array<{ address: string; pubkey: string }> {
  if (event.kind !== DELETION_KIND) return [];

  return getTagValues(event, "a").flatMap((address) => {
    const parsed = parseAddress(address);
    return parsed ? [{ address, pubkey: parsed.pubkey }] : [];
  });
}
