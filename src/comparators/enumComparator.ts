/**
 * Enum comparator
 * Reports enum additions and removals, and pairs values otherwise.
 * Values sharing a number (`allow_alias`) pair by name first; a value with no
 * same-name partner pairs with the next unmatched value of its number.
 */

import { EnumValueView, EnumView } from '../core/descriptors';
import { InvalidComparisonError } from '../core/errors';
import { ChangeType, FindingCategory, FindingContainer } from '../core/findings';
import { enumValueComparator } from './enumValueComparator';
import { EntityComparator } from './types';

export class EnumComparator implements EntityComparator<EnumView> {
  compare(original: EnumView, updated: EnumView | undefined, findings: FindingContainer): void;
  compare(original: EnumView | undefined, updated: EnumView, findings: FindingContainer): void;
  compare(original: EnumView | undefined, updated: EnumView | undefined, findings: FindingContainer): void {
    if (!original) {
      if (!updated) {
        throw new InvalidComparisonError('enum');
      }
      findings.addFinding({
        category: FindingCategory.ENUM_ADDITION,
        changeType: ChangeType.MINOR,
        message: `A new Enum \`${updated.name}\` is added.`,
        file: updated.file,
        line: updated.line
      });
      return;
    }

    if (!updated) {
      findings.addFinding({
        category: FindingCategory.ENUM_REMOVAL,
        changeType: ChangeType.MAJOR,
        message: `An existing Enum \`${original.name}\` is removed.`,
        file: original.file,
        line: original.line
      });
      return;
    }

    const unmatched = [...updated.values];
    const take = (predicate: (value: EnumValueView) => boolean): EnumValueView | undefined => {
      const index = unmatched.findIndex(predicate);
      return index < 0 ? undefined : unmatched.splice(index, 1)[0];
    };

    const partners = new Map<EnumValueView, EnumValueView | undefined>();
    for (const value of original.values) {
      partners.set(value, take(candidate => candidate.number === value.number && candidate.name === value.name));
    }
    for (const value of original.values) {
      if (!partners.get(value)) {
        partners.set(value, take(candidate => candidate.number === value.number));
      }
    }

    for (const value of original.values) {
      enumValueComparator.compare(value, partners.get(value), findings);
    }
    for (const added of unmatched) {
      enumValueComparator.compare(undefined, added, findings);
    }
  }
}

export const enumComparator = new EnumComparator();
