import type {
  ReconcileDecision,
  ReconcileMode,
  ReconciledItem,
} from "@/types/reconcile";

/**
 * Last-writer-wins comparison for one logical key
 *
 * - No local entry: insert
 * - Identifier-keyed: the same id is the same event, keep the local copy
 * - Address-keyed: replace only if strictly newer; ties keep the local copy
 *
 * The rule does not look at where either item came from, so a cache entry
 * can never overwrite a newer item received earlier in the session.
 */
export function resolveConflict<T>(
  existing: ReconciledItem<T> | undefined,
  incoming: ReconciledItem<T>,
  mode: ReconcileMode,
): ReconcileDecision {
  if (!existing) return "insert";
  if (mode === "id") return "keep";
  return incoming.createdAt > existing.createdAt ? "replace" : "keep";
}

/**
 * Fold a batch of items into a map, returning the decision per item.
 * Mutates `items`.
 */
export function mergeItems<T>(
  items: Map<string, ReconciledItem<T>>,
  incoming: Iterable<ReconciledItem<T>>,
  mode: ReconcileMode,
): ReconcileDecision[] {
  const decisions: ReconcileDecision[] = [];

  for (const item of incoming) {
    const decision = resolveConflict(items.get(item.key), item, mode);
    if (decision !== "keep") {
      items.set(item.key, item);
    }
    decisions.push(decision);
  }

  return decisions;
}
