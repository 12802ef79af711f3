/**
 * Error types raised by the breaking change detector
 */

/**
 * A `google.api.resource_reference` annotation that sets neither `type` nor `child_type`
 */
export class MalformedResourceReferenceError extends Error {
  constructor(public readonly fieldName: string) {
    super(
      `In the resource_reference annotation of field \`${fieldName}\`, either \`type\` or \`child_type\` should be defined`
    );
    this.name = 'MalformedResourceReferenceError';
  }
}

/**
 * A comparator was called without either side of the pair
 */
export class InvalidComparisonError extends Error {
  constructor(entityKind: string) {
    super(`Cannot compare ${entityKind}: both the original and the updated ${entityKind} are absent`);
    this.name = 'InvalidComparisonError';
  }
}

/**
 * Materializing a descriptor set from proto sources failed
 */
export class DescriptorLoadError extends Error {
  constructor(
    message: string,
    public readonly stderr: string = '',
    public readonly exitCode: number | null = null
  ) {
    super(message);
    this.name = 'DescriptorLoadError';
  }
}
