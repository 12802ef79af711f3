/**
 * Compare two schema trees
 * Top-level messages and enums are paired across files by fully-qualified name,
 * so moving a message between files of the same package is not a change.
 * The API version segment is left out of the key, so `example.v1.Book`
 * pairs with `example.v1beta1.Book`.
 */

import { EnumView, FileView, MessageView } from '../core/descriptors';
import { FindingContainer } from '../core/findings';
import { enumComparator } from './enumComparator';
import { messageComparator } from './messageComparator';
import { compareByKey } from './pairing';

/**
 * Drop whole segments equal to the API version from a dotted name
 */
export function versionlessName(fullName: string, apiVersion: string | undefined): string {
  if (!apiVersion) {
    return fullName;
  }
  return fullName
    .split('.')
    .filter(segment => segment !== apiVersion)
    .join('.');
}

function indexByVersionlessName<T extends { fullName: string }>(
  files: readonly FileView[],
  pick: (file: FileView) => readonly T[],
  into: Map<T, string>
): T[] {
  return files.flatMap(file => {
    const items = pick(file);
    for (const item of items) {
      into.set(item, versionlessName(item.fullName, file.apiVersion));
    }
    return items;
  });
}

export function compareFileSets(
  originalFiles: readonly FileView[],
  updatedFiles: readonly FileView[],
  findings: FindingContainer
): void {
  const messageKeys = new Map<MessageView, string>();
  compareByKey(
    indexByVersionlessName(originalFiles, file => file.messages, messageKeys),
    indexByVersionlessName(updatedFiles, file => file.messages, messageKeys),
    (message: MessageView) => messageKeys.get(message) ?? message.fullName,
    messageComparator,
    findings
  );

  const enumKeys = new Map<EnumView, string>();
  compareByKey(
    indexByVersionlessName(originalFiles, file => file.enums, enumKeys),
    indexByVersionlessName(updatedFiles, file => file.enums, enumKeys),
    (item: EnumView) => enumKeys.get(item) ?? item.fullName,
    enumComparator,
    findings
  );
}
