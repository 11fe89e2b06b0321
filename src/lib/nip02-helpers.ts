import type { NostrEvent } from "nostr-tools";
import { CONTACTS_KIND } from "@/constants/kinds";
import type { ContactListPayload } from "@/types/reconcile";
import { getTagValues } from "./nostr-utils";

/**
 * Followed pubkeys from a kind 3 contact list, deduplicated in tag order
 */
export function getContactPubkeys(event: NostrEvent): ContactListPayload | null {
  if (event.kind !== CONTACTS_KIND) return null;
  return { pubkeys: Array.from(new Set(getTagValues(event, "p"))) };
}
