/**
 * Pairing helpers shared by the container comparators
 */

import { FindingContainer } from '../core/findings';
import { EntityComparator } from './types';

/**
 * Pair entities across two revisions by key and compare every pair.
 * Original entities come first in their declared order, then additions in updated order.
 */
export function compareByKey<T, K>(
  originals: readonly T[],
  updates: readonly T[],
  keyOf: (item: T) => K,
  comparator: EntityComparator<T>,
  findings: FindingContainer
): void {
  const updatedByKey = new Map<K, T>();
  for (const item of updates) {
    updatedByKey.set(keyOf(item), item);
  }

  const seen = new Set<K>();
  for (const original of originals) {
    const key = keyOf(original);
    seen.add(key);
    comparator.compare(original, updatedByKey.get(key), findings);
  }

  for (const updated of updates) {
    if (!seen.has(keyOf(updated))) {
      comparator.compare(undefined, updated, findings);
    }
  }
}
