/**
 * Shared contract for entity comparators
 */

import { FindingContainer } from '../core/findings';

/**
 * Compares one entity across two schema revisions and appends findings.
 * An absent original means the entity was added; an absent update means it was removed.
 * Calling with both sides absent is rejected by the overloads.
 */
export interface EntityComparator<T> {
  compare(original: T, updated: T | undefined, findings: FindingContainer): void;
  compare(original: T | undefined, updated: T, findings: FindingContainer): void;
}
