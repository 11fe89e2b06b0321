import type { NostrEvent } from "nostr-tools";
import {
  CONTACTS_KIND,
  FOLLOW_SET_KIND,
  GENERIC_REPOST_KIND,
  REACTION_KIND,
  REPOST_KIND,
  VIDEO_CURATION_SET_KIND,
} from "@/constants/kinds";
import { getReconcileMode } from "@/lib/nostr-kinds";
import { getEventAddress } from "@/lib/nostr-utils";
import { getLikeTarget } from "@/lib/nip25-helpers";
import { getRepostTarget } from "@/lib/nip18-helpers";
import { getContactPubkeys } from "@/lib/nip02-helpers";
import { getCurationSet, getFollowSet } from "@/lib/nip51-helpers";
import type {
  CollectionName,
  ContactListPayload,
  CurationSetPayload,
  FollowSetPayload,
  ReactionPayload,
  ReconcileMode,
  ReconciledItem,
  RepostPayload,
} from "@/types/reconcile";

/**
 * How one collection turns events into items and validates cached payloads
 */
export interface CollectionDefinition<T> {
  name: CollectionName;
  mode: ReconcileMode;
  kinds: number[];
  /** Only events authored by the active owner belong in the collection */
  ownerScoped: boolean;
  /** Payload for an event, or null when the event is malformed */
  parse(event: NostrEvent): T | null;
  /** Shape check for payloads read back from the cache */
  isPayload(value: unknown): value is T;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

function hasSetMetadata(value: Record<string, unknown>): boolean {
  return (
    typeof value.identifier === "string" &&
    isOptionalString(value.title) &&
    isOptionalString(value.description) &&
    isOptionalString(value.image)
  );
}

export const reactionsDefinition: CollectionDefinition<ReactionPayload> = {
  name: "reactions",
  mode: getReconcileMode(REACTION_KIND),
  kinds: [REACTION_KIND],
  ownerScoped: true,
  parse: getLikeTarget,
  isPayload: (value): value is ReactionPayload =>
    isRecord(value) &&
    typeof value.target === "string" &&
    isOptionalString(value.targetAuthor),
};

export const repostsDefinition: CollectionDefinition<RepostPayload> = {
  name: "reposts",
  mode: getReconcileMode(GENERIC_REPOST_KIND),
  kinds: [REPOST_KIND, GENERIC_REPOST_KIND],
  ownerScoped: true,
  parse: getRepostTarget,
  isPayload: (value): value is RepostPayload =>
    isRecord(value) &&
    typeof value.target === "string" &&
    isOptionalString(value.eventId),
};

export const contactsDefinition: CollectionDefinition<ContactListPayload> = {
  name: "contacts",
  mode: getReconcileMode(CONTACTS_KIND),
  kinds: [CONTACTS_KIND],
  ownerScoped: true,
  parse: getContactPubkeys,
  isPayload: (value): value is ContactListPayload =>
    isRecord(value) && isStringArray(value.pubkeys),
};

export const followSetsDefinition: CollectionDefinition<FollowSetPayload> = {
  name: "follow-sets",
  mode: getReconcileMode(FOLLOW_SET_KIND),
  kinds: [FOLLOW_SET_KIND],
  ownerScoped: true,
  parse: getFollowSet,
  isPayload: (value): value is FollowSetPayload =>
    isRecord(value) && hasSetMetadata(value) && isStringArray(value.pubkeys),
};

export const curationSetsDefinition: CollectionDefinition<CurationSetPayload> =
  {
    name: "curation-sets",
    mode: getReconcileMode(VIDEO_CURATION_SET_KIND),
    kinds: [VIDEO_CURATION_SET_KIND],
    ownerScoped: false,
    parse: getCurationSet,
    isPayload: (value): value is CurationSetPayload =>
      isRecord(value) && hasSetMetadata(value) && isStringArray(value.videos),
  };

/**
 * Build the reconciled item for an event, or null when the event is malformed
 */
export function toReconciledItem<T>(
  definition: CollectionDefinition<T>,
  event: NostrEvent,
  localOnly = false,
): ReconciledItem<T> | null {
  const payload = definition.parse(event);
  if (payload === null) return null;

  const key = definition.mode === "address" ? getEventAddress(event) : event.id;
  if (key === null) return null;

  return {
    key,
    payload,
    createdAt: event.created_at,
    localOnly,
    eventId: event.id,
  };
}
