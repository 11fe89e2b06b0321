export type { NostrEvent, Filter, EventTemplate } from "nostr-tools";
