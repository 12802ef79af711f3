/**
 * Field comparator
 * Runs an ordered checklist over an original/updated field pair. Step order is
 * significant: name changes short-circuit, type checks are mutually exclusive,
 * and the resource reference check always runs last.
 */

import { FieldView, MapEntryType } from '../core/descriptors';
import { InvalidComparisonError } from '../core/errors';
import { ChangeType, FindingCategory, FindingContainer } from '../core/findings';
import { logger } from '../utils/logger';
import { compareResourceReferences } from './resourceReference';
import { EntityComparator } from './types';

/**
 * Rewrite every dot-separated segment equal to `fromVersion` into `toVersion`.
 * `.example.v1.Enum` with v1 -> v1beta1 becomes `.example.v1beta1.Enum`.
 */
export function transformTypeName(typeName: string, fromVersion: string, toVersion: string): string {
  return typeName
    .split('.')
    .map(segment => (segment === fromVersion ? toVersion : segment))
    .join('.');
}

/**
 * Type names are equivalent when identical, or when the original becomes the
 * update after swapping the api version segment
 */
export function isEquivalentTypeName(
  originalType: string,
  updatedType: string,
  originalVersion: string | undefined,
  updatedVersion: string | undefined
): boolean {
  if (originalType === updatedType) {
    return true;
  }
  if (!originalVersion || !updatedVersion) {
    return false;
  }
  return transformTypeName(originalType, originalVersion, updatedVersion) === updatedType;
}

function labelOf(field: FieldView): string {
  return field.repeated ? 'LABEL_REPEATED' : 'LABEL_OPTIONAL';
}

function mapEntryOf(field: FieldView): MapEntryType {
  return field.mapEntryType ?? { key: '', value: '' };
}

export class FieldComparator implements EntityComparator<FieldView> {
  compare(original: FieldView, updated: FieldView | undefined, findings: FindingContainer): void;
  compare(original: FieldView | undefined, updated: FieldView, findings: FindingContainer): void;
  compare(original: FieldView | undefined, updated: FieldView | undefined, findings: FindingContainer): void {
    if (!original) {
      if (!updated) {
        throw new InvalidComparisonError('field');
      }
      findings.addFinding({
        category: FindingCategory.FIELD_ADDITION,
        changeType: ChangeType.MINOR,
        message: `A new field \`${updated.name}\` is added.`,
        file: updated.file,
        line: updated.line
      });
      return;
    }

    if (!updated) {
      findings.addFinding({
        category: FindingCategory.FIELD_REMOVAL,
        changeType: ChangeType.MAJOR,
        message: `An existing field \`${original.name}\` is removed.`,
        file: original.file,
        line: original.line
      });
      return;
    }

    logger.verboseWithContext('Comparing field', {
      operation: 'compareField',
      field: original.name,
      number: original.number
    });

    if (original.name !== updated.name) {
      this.report(findings, updated, FindingCategory.FIELD_NAME_CHANGE, ChangeType.MAJOR,
        `Name of an existing field is changed from \`${original.name}\` to \`${updated.name}\`.`);
      return;
    }

    if (original.repeated !== updated.repeated) {
      this.report(findings, updated, FindingCategory.FIELD_REPEATED_CHANGE, ChangeType.MAJOR,
        `Repeated state of an existing field \`${original.name}\` is changed from \`${labelOf(original)}\` to \`${labelOf(updated)}\`.`);
    }

    // Loosening a requirement is fine, tightening one is not
    if (!original.required && updated.required) {
      this.report(findings, updated, FindingCategory.FIELD_BEHAVIOR_CHANGE, ChangeType.MAJOR,
        `Field behavior of an existing field \`${original.name}\` is changed.`);
    }

    this.compareTypes(original, updated, findings);
    this.compareOneof(original, updated, findings);
    compareResourceReferences(original, updated, findings);
  }

  private compareTypes(original: FieldView, updated: FieldView, findings: FindingContainer): void {
    const name = original.name;

    if (original.protoType !== updated.protoType) {
      this.report(findings, updated, FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR,
        `Type of an existing field \`${name}\` is changed from \`${original.protoType}\` to \`${updated.protoType}\`.`);
      return;
    }

    if (original.typeName !== updated.typeName) {
      const originalType = original.typeName ?? '';
      const updatedType = updated.typeName ?? '';
      if (!isEquivalentTypeName(originalType, updatedType, original.apiVersion, updated.apiVersion)) {
        this.report(findings, updated, FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR,
          `Type of an existing field \`${name}\` is changed from \`${originalType}\` to \`${updatedType}\`.`);
      }
      return;
    }

    if (original.isMapType && !updated.isMapType) {
      this.report(findings, updated, FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR,
        `Type of an existing field \`${name}\` is changed from a map to \`${updated.typeName ?? updated.protoType}\`.`);
      return;
    }

    if (!original.isMapType && updated.isMapType) {
      this.report(findings, updated, FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR,
        `Type of an existing field \`${name}\` is changed from \`${original.typeName ?? original.protoType}\` to a map.`);
      return;
    }

    if (original.isMapType && updated.isMapType) {
      const entryOriginal = mapEntryOf(original);
      const entryUpdated = mapEntryOf(updated);
      const sameKey = isEquivalentTypeName(entryOriginal.key, entryUpdated.key, original.apiVersion, updated.apiVersion);
      const sameValue = isEquivalentTypeName(entryOriginal.value, entryUpdated.value, original.apiVersion, updated.apiVersion);
      if (!sameKey || !sameValue) {
        this.report(findings, updated, FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR,
          `Type of an existing field \`${name}\` is changed from \`map<${entryOriginal.key}, ${entryOriginal.value}>\` to \`map<${entryUpdated.key}, ${entryUpdated.value}>\`.`);
      }
    }
  }

  private compareOneof(original: FieldView, updated: FieldView, findings: FindingContainer): void {
    const name = original.name;
    const wasInOneof = original.oneofName !== undefined;
    const isInOneof = updated.oneofName !== undefined;

    if (wasInOneof !== isInOneof) {
      if (wasInOneof) {
        this.report(findings, updated, FindingCategory.FIELD_ONEOF_REMOVAL, ChangeType.MAJOR,
          `An existing field \`${name}\` is moved out of One-of.`);
      } else {
        this.report(findings, updated, FindingCategory.FIELD_ONEOF_ADDITION, ChangeType.MAJOR,
          `An existing field \`${name}\` is moved into One-of.`);
      }
      return;
    }

    if (!wasInOneof || original.isOptionalSingular === updated.isOptionalSingular) {
      return;
    }

    if (original.isOptionalSingular) {
      this.report(findings, updated, FindingCategory.FIELD_PROTO3_OPTIONAL_CHANGE, ChangeType.MAJOR,
        `Proto3 optional state of an existing field \`${name}\` is changed to required.`);
    } else {
      this.report(findings, updated, FindingCategory.FIELD_PROTO3_OPTIONAL_CHANGE, ChangeType.MINOR,
        `An existing field \`${name}\` is changed to proto3 optional.`);
    }
  }

  private report(
    findings: FindingContainer,
    at: FieldView,
    category: FindingCategory,
    changeType: ChangeType,
    message: string
  ): void {
    findings.addFinding({ category, changeType, message, file: at.file, line: at.line });
  }
}

export const fieldComparator = new FieldComparator();
