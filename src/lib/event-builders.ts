import type { EventTemplate } from "nostr-tools";
import {
  CONTACTS_KIND,
  DELETION_KIND,
  FOLLOW_SET_KIND,
  GENERIC_REPOST_KIND,
  REACTION_KIND,
  REPOST_KIND,
} from "@/constants/kinds";
import type { FollowSetPayload } from "@/types/reconcile";
import { LIKE_CONTENT } from "./nip25-helpers";

/**
 * Event being liked or reposted
 */
export interface TargetEvent {
  id: string;
  pubkey: string;
  kind: number;
  /** `kind:pubkey:d` for addressable targets */
  address?: string;
}

/**
 * Build a kind 7 "+" reaction (NIP-25)
 */
export function buildLikeTemplate(
  target: TargetEvent,
  createdAt: number,
): EventTemplate {
  const tags: string[][] = [];
  if (target.address) tags.push(["a", target.address]);
  tags.push(["e", target.id], ["p", target.pubkey], ["k", String(target.kind)]);

  return {
    kind: REACTION_KIND,
    content: LIKE_CONTENT,
    tags,
    created_at: createdAt,
  };
}

/**
 * Build a repost (NIP-18). Kind 1 notes get a kind 6 repost, everything else
 * a kind 16 generic repost.
 */
export function buildRepostTemplate(
  target: TargetEvent,
  createdAt: number,
): EventTemplate {
  const tags: string[][] = [];
  if (target.address) tags.push(["a", target.address]);
  tags.push(["e", target.id], ["p", target.pubkey]);

  if (target.kind === 1) {
    return { kind: REPOST_KIND, content: "", tags, created_at: createdAt };
  }

  tags.push(["k", String(target.kind)]);
  return {
    kind: GENERIC_REPOST_KIND,
    content: "",
    tags,
    created_at: createdAt,
  };
}

/**
 * Build a kind 5 deletion request (NIP-09)
 * @param addresses - `kind:pubkey:d` coordinates, for addressable events
 */
export function buildDeletionTemplate(
  eventIds: string[],
  deletedKind: number,
  createdAt: number,
  addresses: string[] = [],
): EventTemplate {
  return {
    kind: DELETION_KIND,
    content: "",
    tags: [
      ...eventIds.map((id) => ["e", id]),
      ...addresses.map((address) => ["a", address]),
      ["k", String(deletedKind)],
    ],
    created_at: createdAt,
  };
}

/**
 * Build a kind 3 contact list (NIP-02)
 */
export function buildContactListTemplate(
  pubkeys: string[],
  createdAt: number,
): EventTemplate {
  return {
    kind: CONTACTS_KIND,
    content: "",
    tags: pubkeys.map((pubkey) => ["p", pubkey]),
    created_at: createdAt,
  };
}

/**
 * Build a kind 30000 follow set (NIP-51)
 */
export function buildFollowSetTemplate(
  set: FollowSetPayload,
  createdAt: number,
): EventTemplate {
  const tags: string[][] = [["d", set.identifier]];
  if (set.title) tags.push(["title", set.title]);
  if (set.description) tags.push(["description", set.description]);
  if (set.image) tags.push(["image", set.image]);
  tags.push(...set.pubkeys.map((pubkey) => ["p", pubkey]));

  return {
    kind: FOLLOW_SET_KIND,
    content: "",
    tags,
    created_at: createdAt,
  };
}
