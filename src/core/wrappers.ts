/**
 * Descriptor wrappers
 * Turns a JSON FileDescriptorSet into the read-only views the comparators consume.
 * All files of one set share a single resource database.
 */

import {
  DescriptorJson,
  EnumDescriptorJson,
  FieldDescriptorJson,
  FileDescriptorJson,
  FileDescriptorSetJson,
  ResourceDescriptorJson
} from './descriptorSchema';
import {
  EnumValueView,
  EnumView,
  FieldView,
  FileView,
  MapEntryType,
  MessageView,
  ResourceDefinition,
  ResourceReference
} from './descriptors';
import { ResourceDatabase } from './resourceDatabase';
import { ANNOTATIONS, API_VERSION_PATTERN, DESCRIPTOR_PATH } from '../utils/constants';
import { isDefined } from '../utils/utils';
import { logger } from '../utils/logger';

/**
 * First package segment (or else directory segment) that names an API version
 */
export function extractApiVersion(packageName: string, fileName: string): string | undefined {
  const fromPackage = packageName.split('.').find(segment => API_VERSION_PATTERN.test(segment));
  if (fromPackage) {
    return fromPackage;
  }
  const directories = fileName.split('/').slice(0, -1);
  return directories.find(segment => API_VERSION_PATTERN.test(segment));
}

export function toResourceDefinition(resource: ResourceDescriptorJson): ResourceDefinition {
  return { type: resource.type, patterns: resource.pattern ?? [] };
}

/**
 * 1-based start lines keyed by source path
 */
class SourceLines {
  private lines = new Map<string, number>();

  constructor(file: FileDescriptorJson) {
    for (const location of file.sourceCodeInfo?.location ?? []) {
      const start = location.span?.[0];
      if (location.path && start !== undefined) {
        this.lines.set(location.path.join(','), start + 1);
      }
    }
  }

  get(path: readonly number[]): number | undefined {
    return this.lines.get(path.join(','));
  }
}

interface WrapContext {
  fileName: string;
  apiVersion?: string;
  lines: SourceLines;
  database: ResourceDatabase;
  messagesByName: Map<string, DescriptorJson>;
}

function indexMessages(
  messages: readonly DescriptorJson[],
  prefix: string,
  index: Map<string, DescriptorJson>
): void {
  for (const message of messages) {
    const fullName = `${prefix}.${message.name}`;
    index.set(fullName, message);
    indexMessages(message.nestedType ?? [], fullName, index);
  }
}

function collectMessageResources(messages: readonly DescriptorJson[], into: ResourceDefinition[]): void {
  for (const message of messages) {
    const resource = message.options?.[ANNOTATIONS.RESOURCE];
    if (resource) {
      into.push(toResourceDefinition(resource));
    }
    collectMessageResources(message.nestedType ?? [], into);
  }
}

function qualify(prefix: string, name: string): string {
  return prefix ? `${prefix}.${name}` : name;
}

function entryTypeOf(field: FieldDescriptorJson | undefined): string {
  return field?.typeName ?? field?.type ?? '';
}

function wrapMapEntry(entry: DescriptorJson): MapEntryType {
  const fields = entry.field ?? [];
  return {
    key: entryTypeOf(fields.find(field => field.number === 1)),
    value: entryTypeOf(fields.find(field => field.number === 2))
  };
}

function wrapField(
  field: FieldDescriptorJson,
  message: DescriptorJson,
  path: number[],
  context: WrapContext
): FieldView {
  const repeated = field.label === 'LABEL_REPEATED';
  const behavior = field.options?.[ANNOTATIONS.FIELD_BEHAVIOR] ?? [];
  const entry = field.typeName ? context.messagesByName.get(field.typeName) : undefined;
  const isMapType = repeated && entry?.options?.mapEntry === true;
  const messageResource = message.options?.[ANNOTATIONS.RESOURCE];
  const line = context.lines.get(path) ?? 0;

  let resourceReference: ResourceReference | undefined;
  const reference = field.options?.[ANNOTATIONS.RESOURCE_REFERENCE];
  if (reference) {
    resourceReference = {
      type: reference.type,
      childType: reference.childType,
      line: context.lines.get([...path, DESCRIPTOR_PATH.FIELD_OPTIONS, DESCRIPTOR_PATH.RESOURCE_REFERENCE]) ?? line
    };
  }

  const oneofName = isDefined(field.oneofIndex)
    ? message.oneofDecl?.[field.oneofIndex]?.name
    : undefined;

  return {
    name: field.name,
    number: field.number,
    repeated,
    required: field.label === 'LABEL_REQUIRED' || behavior.includes('REQUIRED'),
    protoType: field.type ?? '',
    typeName: field.typeName,
    isMapType,
    mapEntryType: isMapType && entry ? wrapMapEntry(entry) : undefined,
    oneofName,
    isOptionalSingular: field.proto3Optional === true,
    resourceReference,
    apiVersion: context.apiVersion,
    messageResource: messageResource ? toResourceDefinition(messageResource) : undefined,
    resourceDatabase: context.database,
    file: context.fileName,
    line
  };
}

function wrapEnum(
  descriptor: EnumDescriptorJson,
  prefix: string,
  path: number[],
  context: WrapContext
): EnumView {
  const values: EnumValueView[] = (descriptor.value ?? []).map((value, i) => ({
    name: value.name,
    number: value.number,
    file: context.fileName,
    line: context.lines.get([...path, DESCRIPTOR_PATH.ENUM_VALUE, i]) ?? 0
  }));
  return {
    name: descriptor.name,
    fullName: qualify(prefix, descriptor.name),
    values,
    file: context.fileName,
    line: context.lines.get(path) ?? 0
  };
}

function wrapMessage(
  descriptor: DescriptorJson,
  prefix: string,
  path: number[],
  context: WrapContext
): MessageView {
  const fullName = qualify(prefix, descriptor.name);
  const resource = descriptor.options?.[ANNOTATIONS.RESOURCE];

  const fields = (descriptor.field ?? []).map((field, i) =>
    wrapField(field, descriptor, [...path, DESCRIPTOR_PATH.MESSAGE_FIELD, i], context)
  );

  const nestedMessages: MessageView[] = [];
  (descriptor.nestedType ?? []).forEach((nested, i) => {
    // Map entries are synthesized by the compiler and compared through their map field
    if (nested.options?.mapEntry) {
      return;
    }
    nestedMessages.push(wrapMessage(nested, fullName, [...path, DESCRIPTOR_PATH.MESSAGE_NESTED_TYPE, i], context));
  });

  const nestedEnums = (descriptor.enumType ?? []).map((nested, i) =>
    wrapEnum(nested, fullName, [...path, DESCRIPTOR_PATH.MESSAGE_ENUM_TYPE, i], context)
  );

  return {
    name: descriptor.name,
    fullName,
    fields,
    nestedMessages,
    nestedEnums,
    resource: resource ? toResourceDefinition(resource) : undefined,
    file: context.fileName,
    line: context.lines.get(path) ?? 0
  };
}

/**
 * Build a resource database over every file-level resource definition and
 * every message-level resource option of the set
 */
export function buildResourceDatabase(set: FileDescriptorSetJson): ResourceDatabase {
  const database = new ResourceDatabase();
  for (const file of set.file ?? []) {
    const resources: ResourceDefinition[] = (file.options?.[ANNOTATIONS.RESOURCE_DEFINITION] ?? []).map(toResourceDefinition);
    collectMessageResources(file.messageType ?? [], resources);
    database.registerResources(resources);
  }
  return database;
}

export function wrapFileDescriptorSet(set: FileDescriptorSetJson): FileView[] {
  const files = set.file ?? [];
  const database = buildResourceDatabase(set);

  const messagesByName = new Map<string, DescriptorJson>();
  for (const file of files) {
    const packagePrefix = file.package ? `.${file.package}` : '';
    indexMessages(file.messageType ?? [], packagePrefix, messagesByName);
  }

  const views = files.map((file): FileView => {
    const packageName = file.package ?? '';
    const context: WrapContext = {
      fileName: file.name,
      apiVersion: extractApiVersion(packageName, file.name),
      lines: new SourceLines(file),
      database,
      messagesByName
    };

    return {
      name: file.name,
      packageName,
      apiVersion: context.apiVersion,
      messages: (file.messageType ?? []).map((message, i) =>
        wrapMessage(message, packageName, [DESCRIPTOR_PATH.FILE_MESSAGE_TYPE, i], context)
      ),
      enums: (file.enumType ?? []).map((descriptor, i) =>
        wrapEnum(descriptor, packageName, [DESCRIPTOR_PATH.FILE_ENUM_TYPE, i], context)
      ),
      resourceDefinitions: (file.options?.[ANNOTATIONS.RESOURCE_DEFINITION] ?? []).map(toResourceDefinition),
      resourceDatabase: database
    };
  });

  logger.debug(`Wrapped ${views.length} file(s) with ${database.size} resource definition(s)`);
  return views;
}
