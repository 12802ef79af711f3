/**
 * Normalized views over protobuf descriptors
 * Comparators only read these; they are built once per comparison run and never mutated.
 */

/**
 * `google.api.resource_reference` annotation on a field
 */
export interface ResourceReference {
  type?: string;
  childType?: string;
  /** Line of the annotation, when source info is available */
  line?: number;
}

/**
 * `google.api.resource` (message level) or `google.api.resource_definition` (file level)
 */
export interface ResourceDefinition {
  type: string;
  patterns: readonly string[];
}

/**
 * Read-only queries the resource-reference resolver makes against a schema tree
 */
export interface ResourceIndex {
  getResourceByType(type: string): readonly ResourceDefinition[];
  getParentResourcesByChildType(childType: string): readonly ResourceDefinition[];
}

export interface MapEntryType {
  key: string;
  value: string;
}

export interface FieldView {
  name: string;
  number: number;
  repeated: boolean;
  required: boolean;
  /** Descriptor type name such as `TYPE_INT32` or `TYPE_MESSAGE` */
  protoType: string;
  /** Fully-qualified type for message and enum fields, e.g. `.pkg.v1.Foo` */
  typeName?: string;
  isMapType: boolean;
  mapEntryType?: MapEntryType;
  oneofName?: string;
  /** proto3 `optional` */
  isOptionalSingular: boolean;
  resourceReference?: ResourceReference;
  /** Version segment of the enclosing package, e.g. `v1` or `v1beta1` */
  apiVersion?: string;
  /** Resource declared by the enclosing message */
  messageResource?: ResourceDefinition;
  resourceDatabase?: ResourceIndex;
  file: string;
  line: number;
}

export interface EnumValueView {
  name: string;
  number: number;
  file: string;
  line: number;
}

export interface EnumView {
  name: string;
  fullName: string;
  values: readonly EnumValueView[];
  file: string;
  line: number;
}

export interface MessageView {
  name: string;
  fullName: string;
  fields: readonly FieldView[];
  nestedMessages: readonly MessageView[];
  nestedEnums: readonly EnumView[];
  resource?: ResourceDefinition;
  file: string;
  line: number;
}

export interface FileView {
  name: string;
  packageName: string;
  apiVersion?: string;
  messages: readonly MessageView[];
  enums: readonly EnumView[];
  resourceDefinitions: readonly ResourceDefinition[];
  resourceDatabase: ResourceIndex;
}
