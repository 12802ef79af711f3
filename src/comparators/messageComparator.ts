/**
 * Message comparator
 * Pairs fields by number, nested messages and nested enums by name.
 */

import { EnumView, FieldView, MessageView } from '../core/descriptors';
import { InvalidComparisonError } from '../core/errors';
import { ChangeType, FindingCategory, FindingContainer } from '../core/findings';
import { enumComparator } from './enumComparator';
import { fieldComparator } from './fieldComparator';
import { compareByKey } from './pairing';
import { EntityComparator } from './types';

export class MessageComparator implements EntityComparator<MessageView> {
  compare(original: MessageView, updated: MessageView | undefined, findings: FindingContainer): void;
  compare(original: MessageView | undefined, updated: MessageView, findings: FindingContainer): void;
  compare(original: MessageView | undefined, updated: MessageView | undefined, findings: FindingContainer): void {
    if (!original) {
      if (!updated) {
        throw new InvalidComparisonError('message');
      }
      findings.addFinding({
        category: FindingCategory.MESSAGE_ADDITION,
        changeType: ChangeType.MINOR,
        message: `A new message \`${updated.name}\` is added.`,
        file: updated.file,
        line: updated.line
      });
      return;
    }

    if (!updated) {
      findings.addFinding({
        category: FindingCategory.MESSAGE_REMOVAL,
        changeType: ChangeType.MAJOR,
        message: `An existing message \`${original.name}\` is removed.`,
        file: original.file,
        line: original.line
      });
      return;
    }

    compareByKey(original.fields, updated.fields, (field: FieldView) => field.number, fieldComparator, findings);
    compareByKey(original.nestedMessages, updated.nestedMessages, (message: MessageView) => message.name, this, findings);
    compareByKey(original.nestedEnums, updated.nestedEnums, (nested: EnumView) => nested.name, enumComparator, findings);
  }
}

export const messageComparator = new MessageComparator();
