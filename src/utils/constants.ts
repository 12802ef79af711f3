/**
 * Constants for the breaking change detector
 * Centralized location for descriptor field numbers, annotation keys and defaults
 */

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  /** Default buf path */
  BUF_PATH: 'buf',
  /** Default timeout for building a descriptor set (ms) */
  LOAD_TIMEOUT_MS: 60000,
  /** Default `Diagnostic.source` */
  DIAGNOSTIC_SOURCE: 'protobuf-breaking',
  /** Default log level */
  LOG_LEVEL: 'info'
} as const;

/**
 * Maximum buffer size for buf stdout/stderr in bytes
 */
export const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024;

/**
 * Field numbers used in `SourceCodeInfo.Location.path`
 */
export const DESCRIPTOR_PATH = {
  /** FileDescriptorProto.message_type */
  FILE_MESSAGE_TYPE: 4,
  /** FileDescriptorProto.enum_type */
  FILE_ENUM_TYPE: 5,
  /** DescriptorProto.field */
  MESSAGE_FIELD: 2,
  /** DescriptorProto.nested_type */
  MESSAGE_NESTED_TYPE: 3,
  /** DescriptorProto.enum_type */
  MESSAGE_ENUM_TYPE: 4,
  /** EnumDescriptorProto.value */
  ENUM_VALUE: 2,
  /** FieldDescriptorProto.options */
  FIELD_OPTIONS: 8,
  /** FieldOptions extension number of google.api.resource_reference */
  RESOURCE_REFERENCE: 1055
} as const;

/**
 * Extension keys as they appear in the JSON form of descriptor options
 */
export const ANNOTATIONS = {
  RESOURCE_REFERENCE: '[google.api.resource_reference]',
  RESOURCE: '[google.api.resource]',
  RESOURCE_DEFINITION: '[google.api.resource_definition]',
  FIELD_BEHAVIOR: '[google.api.field_behavior]'
} as const;

/**
 * Package or path segment naming an API version: v1, v2beta, v1alpha3, ...
 */
export const API_VERSION_PATTERN = /^v\d+(?:(?:alpha|beta)\d*)?$/;
