/**
 * Core module barrel exports
 * Findings, descriptor views, resource database and wrappers
 */

export { ChangeType, FindingCategory, FindingContainer, createFinding, toFindingRecord } from './findings';
export type { Finding, FindingRecord, NewFinding, SourceLocation } from './findings';
export { DescriptorLoadError, InvalidComparisonError, MalformedResourceReferenceError } from './errors';
export { ResourceDatabase, getParentPattern } from './resourceDatabase';
export { buildResourceDatabase, extractApiVersion, toResourceDefinition, wrapFileDescriptorSet } from './wrappers';
export { fileDescriptorSetSchema } from './descriptorSchema';
export type { DescriptorJson, FileDescriptorJson, FileDescriptorSetJson } from './descriptorSchema';

// View types
export type {
  EnumValueView,
  EnumView,
  FieldView,
  FileView,
  MapEntryType,
  MessageView,
  ResourceDefinition,
  ResourceIndex,
  ResourceReference
} from './descriptors';
