/**
 * Event kinds the sync engine reconciles
 */
export const CONTACTS_KIND = 3; // NIP-02 contact list
export const DELETION_KIND = 5; // NIP-09 event deletion
export const REPOST_KIND = 6; // NIP-18 repost of a kind 1 note
export const REACTION_KIND = 7; // NIP-25 reaction
export const GENERIC_REPOST_KIND = 16; // NIP-18 repost of any other kind
export const FOLLOW_SET_KIND = 30000; // NIP-51 follow set
export const VIDEO_CURATION_SET_KIND = 30005; // NIP-51 video curation set
export const ADDRESSABLE_SHORT_VIDEO_KIND = 34236; // NIP-71 addressable short video
