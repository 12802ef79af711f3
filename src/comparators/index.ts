/**
 * Comparators module barrel exports
 */

export { FieldComparator, fieldComparator, isEquivalentTypeName, transformTypeName } from './fieldComparator';
export { EnumValueComparator, enumValueComparator } from './enumValueComparator';
export { EnumComparator, enumComparator } from './enumComparator';
export { MessageComparator, messageComparator } from './messageComparator';
export { compareResourceReferences, getReferenceKind, isReferenceRegistered } from './resourceReference';
export type { ResourceReferenceKind } from './resourceReference';
export { compareByKey } from './pairing';
export { compareFileSets, versionlessName } from './fileSet';
export type { EntityComparator } from './types';
