import { getTagValue } from "applesauce-core/helpers";
import type { NostrEvent } from "nostr-tools";
import { FOLLOW_SET_KIND, VIDEO_CURATION_SET_KIND } from "@/constants/kinds";
import type {
  CurationSetPayload,
  FollowSetPayload,
} from "@/types/reconcile";
import { getTagValues } from "./nostr-utils";

interface SetMetadata {
  identifier: string;
  title?: string;
  description?: string;
  image?: string;
}

/**
 * Common NIP-51 set fields. `name` is the legacy spelling of `title`.
 */
function getSetMetadata(event: NostrEvent): SetMetadata | null {
  const identifier = getTagValue(event, "d");
  if (identifier === undefined) return null;

  const metadata: SetMetadata = { identifier };
  const title = getTagValue(event, "title") ?? getTagValue(event, "name");
  const description = getTagValue(event, "description");
  const image = getTagValue(event, "image");

  if (title) metadata.title = title;
  if (description) metadata.description = description;
  if (image) metadata.image = image;
  return metadata;
}

/**
 * Parse a kind 30000 follow set
 */
export function getFollowSet(event: NostrEvent): FollowSetPayload | null {
  if (event.kind !== FOLLOW_SET_KIND) return null;

  const metadata = getSetMetadata(event);
  if (!metadata) return null;

  return {
    ...metadata,
    pubkeys: Array.from(new Set(getTagValues(event, "p"))),
  };
}

/**
 * Parse a kind 30005 video curation set. Videos are `a` and `e` references
 * kept in tag order.
 */
export function getCurationSet(event: NostrEvent): CurationSetPayload | null {
  if (event.kind !== VIDEO_CURATION_SET_KIND) return null;

  const metadata = getSetMetadata(event);
  if (!metadata) return null;

  const videos = event.tags
    .filter((tag) => (tag[0] === "a" || tag[0] === "e") && tag[1])
    .map((tag) => tag[1]);

  return { ...metadata, videos };
}
