/**
 * Enum value comparator
 * Enum values carry only a number and a name: they can be added, removed or renamed.
 */

import { EnumValueView } from '../core/descriptors';
import { InvalidComparisonError } from '../core/errors';
import { ChangeType, FindingCategory, FindingContainer } from '../core/findings';
import { EntityComparator } from './types';

export class EnumValueComparator implements EntityComparator<EnumValueView> {
  compare(original: EnumValueView, updated: EnumValueView | undefined, findings: FindingContainer): void;
  compare(original: EnumValueView | undefined, updated: EnumValueView, findings: FindingContainer): void;
  compare(original: EnumValueView | undefined, updated: EnumValueView | undefined, findings: FindingContainer): void {
    if (!original) {
      if (!updated) {
        throw new InvalidComparisonError('enum value');
      }
      findings.addFinding({
        category: FindingCategory.ENUM_VALUE_ADDITION,
        changeType: ChangeType.MINOR,
        message: `A new EnumValue \`${updated.name}\` is added.`,
        file: updated.file,
        line: updated.line
      });
    } else if (!updated) {
      findings.addFinding({
        category: FindingCategory.ENUM_VALUE_REMOVAL,
        changeType: ChangeType.MAJOR,
        message: `An existing EnumValue \`${original.name}\` is removed.`,
        file: original.file,
        line: original.line
      });
    } else if (original.name !== updated.name) {
      findings.addFinding({
        category: FindingCategory.ENUM_VALUE_NAME_CHANGE,
        changeType: ChangeType.MAJOR,
        message: `Name of the EnumValue is changed from \`${original.name}\` to \`${updated.name}\`.`,
        file: updated.file,
        line: updated.line
      });
    }
  }
}

export const enumValueComparator = new EnumValueComparator();
