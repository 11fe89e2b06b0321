/**
 * Identifier-keyed items dedupe by event id; address-keyed items keep the
 * newest version per `kind:pubkey:d-tag`
 */
export type ReconcileMode = "id" | "address";

/**
 * Where an item came from. Every source goes through the same comparison.
 */
export type ItemSource = "live" | "local" | "cache";

/**
 * A reconciled record (like, repost, contact list, follow set, curation set)
 */
export interface ReconciledItem<T> {
  /** Event id, or `kind:pubkey:d` for addressable kinds */
  key: string;
  payload: T;
  /** created_at of the source event (seconds) */
  createdAt: number;
  /** True for items built on this device that relays have not echoed yet */
  localOnly: boolean;
  /** Id of the source event */
  eventId: string;
}

export type ReconcileDecision = "insert" | "replace" | "keep";

export interface ApplyResult {
  inserted: number;
  replaced: number;
  kept: number;
  /** Local-only items a relay has now echoed back */
  confirmed: number;
  /** Items skipped because their source event was deleted */
  suppressed: number;
}

export type CollectionName =
  | "reactions"
  | "reposts"
  | "contacts"
  | "follow-sets"
  | "curation-sets";

export interface ReactionPayload {
  /** Id of the reacted-to event */
  target: string;
  targetAuthor?: string;
}

export interface RepostPayload {
  /** `kind:pubkey:d` coordinate for addressable targets, otherwise the event id */
  target: string;
  /** Event id from the `e` tag, when present */
  eventId?: string;
}

export interface ContactListPayload {
  pubkeys: string[];
}

export interface FollowSetPayload {
  identifier: string;
  title?: string;
  description?: string;
  image?: string;
  pubkeys: string[];
}

export interface CurationSetPayload {
  identifier: string;
  title?: string;
  description?: string;
  image?: string;
  /** Video references: `a` coordinates and `e` ids in tag order */
  videos: string[];
}
