import type { NostrEvent } from "nostr-tools";
import { REACTION_KIND } from "@/constants/kinds";
import type { ReactionPayload } from "@/types/reconcile";

/** Reaction content that counts as a like */
export const LIKE_CONTENT = "+";

/**
 * Last `e` tag is the reacted-to event (NIP-25)
 */
function getLastTagValue(event: NostrEvent, tagName: string): string | undefined {
  for (let i = event.tags.length - 1; i >= 0; i--) {
    const tag = event.tags[i];
    if (tag[0] === tagName && tag[1]) return tag[1];
  }
  return undefined;
}

/**
 * Parse a kind 7 like. Returns null for other reactions (emoji, "-") and for
 * reactions without a target.
 */
export function getLikeTarget(event: NostrEvent): ReactionPayload | null {
  if (event.kind !== REACTION_KIND) return null;
  if (event.content !== LIKE_CONTENT) return null;

  const target = getLastTagValue(event, "e");
  if (!target) return null;

  const targetAuthor = getLastTagValue(event, "p");
  return targetAuthor ? { target, targetAuthor } : { target };
}
