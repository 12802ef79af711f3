/**
 * Resource reference resolution
 * Decides whether adding, removing or changing a `google.api.resource_reference`
 * annotation breaks consumers. Parent/child lookups always go through the
 * resource database of the tree that owns the `child_type` reference.
 */

import { FieldView, ResourceIndex, ResourceReference } from '../core/descriptors';
import { MalformedResourceReferenceError } from '../core/errors';
import { ChangeType, FindingCategory, FindingContainer } from '../core/findings';
import { logger } from '../utils/logger';

export type ResourceReferenceKind =
  | { kind: 'type'; value: string }
  | { kind: 'childType'; value: string };

/**
 * Classify a reference by the field it sets. `type` wins when both are present.
 * @throws MalformedResourceReferenceError when neither is set
 */
export function getReferenceKind(reference: ResourceReference, fieldName: string): ResourceReferenceKind {
  if (reference.type) {
    return { kind: 'type', value: reference.type };
  }
  if (reference.childType) {
    return { kind: 'childType', value: reference.childType };
  }
  throw new MalformedResourceReferenceError(fieldName);
}

/**
 * Whether the referenced resource is defined in the given tree.
 * A tree without a resource database has nothing registered.
 */
export function isReferenceRegistered(
  reference: ResourceReferenceKind,
  database: ResourceIndex | undefined
): boolean {
  if (!database) {
    return false;
  }
  const resources = reference.kind === 'childType'
    ? database.getParentResourcesByChildType(reference.value)
    : database.getResourceByType(reference.value);
  return resources.length > 0;
}

function resolvesToParent(childType: string, parentType: string, database: ResourceIndex | undefined): boolean {
  if (!database) {
    return false;
  }
  return database.getParentResourcesByChildType(childType).some(parent => parent.type === parentType);
}

/**
 * A field-level reference that was dropped in favour of a message-level
 * `google.api.resource` carrying the same effective type
 */
function isMovedToMessageOptions(reference: ResourceReferenceKind, original: FieldView, updated: FieldView): boolean {
  const messageResource = updated.messageResource;
  if (!messageResource) {
    return false;
  }
  if (reference.kind === 'childType') {
    return resolvesToParent(reference.value, messageResource.type, original.resourceDatabase);
  }
  return messageResource.type === reference.value;
}

export function compareResourceReferences(
  original: FieldView,
  updated: FieldView,
  findings: FindingContainer
): void {
  const referenceOriginal = original.resourceReference;
  const referenceUpdated = updated.resourceReference;

  if (!referenceOriginal) {
    if (!referenceUpdated) {
      return;
    }
    const added = getReferenceKind(referenceUpdated, updated.name);
    const registered = isReferenceRegistered(added, updated.resourceDatabase);
    logger.verboseWithContext('Resource reference added', {
      operation: 'compareResourceReferences',
      field: updated.name,
      registered
    });
    findings.addFinding({
      category: FindingCategory.RESOURCE_REFERENCE_ADDITION,
      changeType: registered ? ChangeType.MINOR : ChangeType.MAJOR,
      message: registered
        ? `A resource reference option is added to the field \`${original.name}\`.`
        : `A resource reference option is added to the field \`${original.name}\`, but it is not defined anywhere.`,
      file: updated.file,
      line: referenceUpdated.line ?? updated.line
    });
    return;
  }

  if (!referenceUpdated) {
    const removed = getReferenceKind(referenceOriginal, original.name);
    const moved = isMovedToMessageOptions(removed, original, updated);
    findings.addFinding({
      category: FindingCategory.RESOURCE_REFERENCE_REMOVAL,
      changeType: moved ? ChangeType.MINOR : ChangeType.MAJOR,
      message: moved
        ? `A resource reference option of the field \`${original.name}\` is removed, but added back to the message options.`
        : `A resource reference option of the field \`${original.name}\` is removed.`,
      file: original.file,
      line: referenceOriginal.line ?? original.line
    });
    return;
  }

  const kindOriginal = getReferenceKind(referenceOriginal, original.name);
  const kindUpdated = getReferenceKind(referenceUpdated, updated.name);
  const line = referenceUpdated.line ?? updated.line;

  if (kindOriginal.kind === kindUpdated.kind) {
    if (kindOriginal.value !== kindUpdated.value) {
      findings.addFinding({
        category: FindingCategory.RESOURCE_REFERENCE_CHANGE,
        changeType: ChangeType.MAJOR,
        message: `The type of resource reference option of the field \`${original.name}\` is changed from \`${kindOriginal.value}\` to \`${kindUpdated.value}\`.`,
        file: updated.file,
        line
      });
    }
    return;
  }

  // `type` <-> `child_type` is not breaking when both name the same resource
  const originalIsChild = kindOriginal.kind === 'childType';
  const child = originalIsChild ? kindOriginal.value : kindUpdated.value;
  const parent = originalIsChild ? kindUpdated.value : kindOriginal.value;
  const database = originalIsChild ? original.resourceDatabase : updated.resourceDatabase;

  if (!resolvesToParent(child, parent, database)) {
    findings.addFinding({
      category: FindingCategory.RESOURCE_REFERENCE_CHANGE,
      changeType: ChangeType.MAJOR,
      message: `The child_type \`${child}\` and type \`${parent}\` of resource reference option in field \`${original.name}\` cannot be resolved to the identical resource.`,
      file: updated.file,
      line
    });
  }
}
