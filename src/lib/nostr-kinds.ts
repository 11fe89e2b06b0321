/**
 * Nostr event kind ranges and how the reconciler keys each range
 *
 * Based on NIP-01:
 * - Regular kinds: 1-9999 (except 3), identified by event id
 * - Replaceable kinds: 0, 3, 10000-19999 (newest per pubkey+kind wins)
 * - Ephemeral kinds: 20000-29999 (not stored)
 * - Parameterized replaceable: 30000-39999 (newest per pubkey+kind+d-tag wins)
 */

import { isReplaceableKind } from "nostr-tools/kinds";
import type { ReconcileMode } from "@/types/reconcile";

export const PARAMETERIZED_REPLACEABLE_START = 30000;
export const PARAMETERIZED_REPLACEABLE_END = 40000;

/**
 * Check if a kind is parameterized replaceable (30000-39999)
 */
export function isParameterizedReplaceableKind(kind: number): boolean {
  return (
    kind >= PARAMETERIZED_REPLACEABLE_START &&
    kind < PARAMETERIZED_REPLACEABLE_END
  );
}

/**
 * Check if events of this kind are identified by `kind:pubkey:d-tag`
 * rather than by event id
 */
export function isAddressableKind(kind: number): boolean {
  return isReplaceableKind(kind) || isParameterizedReplaceableKind(kind);
}

/**
 * How the reconciler keys items of a kind
 */
export function getReconcileMode(kind: number): ReconcileMode {
  return isAddressableKind(kind) ? "address" : "id";
}
