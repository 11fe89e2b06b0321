import type { Filter } from "nostr-tools";

export const DEFAULT_MAX_FILTER_LIMIT = 100;

/**
 * Clamp every filter limit to `maxLimit`.
 *
 * All other fields (ids, authors, kinds, tag filters, since/until, search)
 * are copied through unchanged. Filters without a limit stay unlimited.
 * The input array and filters are not mutated.
 */
export function optimizeFilters(
  filters: Filter[],
  maxLimit: number = DEFAULT_MAX_FILTER_LIMIT,
): Filter[] {
  return filters.map((filter) => {
    if (filter.limit !== undefined && filter.limit > maxLimit) {
      return { ...filter, limit: maxLimit };
    }
    return { ...filter };
  });
}
