/**
 * Tests for field comparator
 */

import { fieldComparator, isEquivalentTypeName, transformTypeName } from '../fieldComparator';
import { ChangeType, FindingCategory, FindingContainer } from '../../core/findings';
import { InvalidComparisonError } from '../../core/errors';
import { makeField } from '../../__tests__/fixtures/views';

describe('FieldComparator', () => {
  let findings: FindingContainer;

  beforeEach(() => {
    findings = new FindingContainer();
  });

  describe('addition and removal', () => {
    it('should report a removed field at the original location', () => {
      const fieldFoo = makeField({ name: 'Foo', file: 'a.proto', line: 4 });
      fieldComparator.compare(fieldFoo, undefined, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]).toEqual({
        category: FindingCategory.FIELD_REMOVAL,
        changeType: ChangeType.MAJOR,
        message: 'An existing field `Foo` is removed.',
        location: { file: 'a.proto', line: 4 },
        actionable: true
      });
    });

    it('should report an added field as minor', () => {
      const fieldFoo = makeField({ name: 'Foo' });
      fieldComparator.compare(undefined, fieldFoo, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_ADDITION);
      expect(all[0]?.changeType).toBe(ChangeType.MINOR);
      expect(all[0]?.message).toBe('A new field `Foo` is added.');
    });

    it('should reject a call with both sides absent', () => {
      expect(() => Reflect.apply(fieldComparator.compare, fieldComparator, [undefined, undefined, findings]))
        .toThrow(InvalidComparisonError);
    });
  });

  describe('name', () => {
    it('should stop after a name change', () => {
      const fieldFoo = makeField({ name: 'Foo', protoType: 'TYPE_INT32' });
      const fieldBar = makeField({ name: 'Bar', protoType: 'TYPE_STRING' });
      fieldComparator.compare(fieldFoo, fieldBar, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_NAME_CHANGE);
      expect(all[0]?.message).toBe('Name of an existing field is changed from `Foo` to `Bar`.');
    });
  });

  describe('repeated and required', () => {
    it('should report a repeated label change', () => {
      fieldComparator.compare(makeField({ repeated: true }), makeField({ repeated: false }), findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_REPEATED_CHANGE);
      expect(all[0]?.message).toBe(
        'Repeated state of an existing field `my_field` is changed from `LABEL_REPEATED` to `LABEL_OPTIONAL`.'
      );
    });

    it('should report optional to required as a behavior change', () => {
      fieldComparator.compare(makeField({ required: false }), makeField({ required: true }), findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_BEHAVIOR_CHANGE);
      expect(all[0]?.changeType).toBe(ChangeType.MAJOR);
      expect(all[0]?.message).toBe('Field behavior of an existing field `my_field` is changed.');
    });

    it('should not report required to optional', () => {
      fieldComparator.compare(makeField({ required: true }), makeField({ required: false }), findings);
      expect(findings.getAllFindings()).toEqual([]);
    });

    it('should keep independent findings from one pass', () => {
      const original = makeField({ repeated: true, protoType: 'TYPE_INT32' });
      const updated = makeField({ repeated: false, protoType: 'TYPE_INT64' });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings().map(f => f.category)).toEqual([
        FindingCategory.FIELD_REPEATED_CHANGE,
        FindingCategory.FIELD_TYPE_CHANGE
      ]);
    });
  });

  describe('types', () => {
    it('should report a primitive type change', () => {
      const fieldInt = makeField({ name: 'foo', protoType: 'TYPE_INT32' });
      const fieldString = makeField({ name: 'foo', protoType: 'TYPE_STRING' });
      fieldComparator.compare(fieldInt, fieldString, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_TYPE_CHANGE);
      expect(all[0]?.changeType).toBe(ChangeType.MAJOR);
      expect(all[0]?.message).toBe('Type of an existing field `foo` is changed from `TYPE_INT32` to `TYPE_STRING`.');
    });

    it('should report a message type change', () => {
      const original = makeField({ protoType: 'TYPE_MESSAGE', typeName: '.example.v1.Enum', apiVersion: 'v1' });
      const updated = makeField({ protoType: 'TYPE_MESSAGE', typeName: '.example.v1beta1.EnumUpdate', apiVersion: 'v1beta1' });
      fieldComparator.compare(original, updated, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.message).toBe(
        'Type of an existing field `my_field` is changed from `.example.v1.Enum` to `.example.v1beta1.EnumUpdate`.'
      );
    });

    it('should allow a version segment update', () => {
      const original = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v1.Enum', apiVersion: 'v1' });
      const updated = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v1beta1.Enum', apiVersion: 'v1beta1' });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings()).toEqual([]);
    });

    it('should report a major version move to another type', () => {
      const original = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v1.Enum', apiVersion: 'v1' });
      const updated = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v2.EnumUpdate', apiVersion: 'v2' });
      fieldComparator.compare(original, updated, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_TYPE_CHANGE);
      expect(all[0]?.changeType).toBe(ChangeType.MAJOR);
    });

    it('should not tolerate version changes without an original api version', () => {
      const original = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v1.Enum' });
      const updated = makeField({ protoType: 'TYPE_ENUM', typeName: '.example.v1beta1.Enum', apiVersion: 'v1beta1' });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings()).toHaveLength(1);
    });

    it('should report a map becoming a plain field', () => {
      const original = makeField({
        repeated: true,
        protoType: 'TYPE_MESSAGE',
        typeName: '.example.v1.Book.LabelsEntry',
        isMapType: true,
        mapEntryType: { key: 'string', value: 'string' }
      });
      const updated = makeField({ repeated: true, protoType: 'TYPE_MESSAGE', typeName: '.example.v1.Book.LabelsEntry' });
      fieldComparator.compare(original, updated, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.message).toBe(
        'Type of an existing field `my_field` is changed from a map to `.example.v1.Book.LabelsEntry`.'
      );
    });

    it('should report a plain field becoming a map', () => {
      const original = makeField({ repeated: true, protoType: 'TYPE_MESSAGE', typeName: '.example.v1.Entry' });
      const updated = makeField({
        repeated: true,
        protoType: 'TYPE_MESSAGE',
        typeName: '.example.v1.Entry',
        isMapType: true,
        mapEntryType: { key: 'string', value: 'string' }
      });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings()[0]?.message).toBe(
        'Type of an existing field `my_field` is changed from `.example.v1.Entry` to a map.'
      );
    });

    it('should report a map value type change', () => {
      const mapField = (value: string) => makeField({
        repeated: true,
        protoType: 'TYPE_MESSAGE',
        typeName: '.example.v1.Book.CountsEntry',
        isMapType: true,
        mapEntryType: { key: 'string', value }
      });
      fieldComparator.compare(mapField('int32'), mapField('int64'), findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_TYPE_CHANGE);
      expect(all[0]?.message).toBe(
        'Type of an existing field `my_field` is changed from `map<string, int32>` to `map<string, int64>`.'
      );
    });

    it('should accept identical maps', () => {
      const mapField = () => makeField({
        repeated: true,
        protoType: 'TYPE_MESSAGE',
        typeName: '.example.v1.Book.CountsEntry',
        isMapType: true,
        mapEntryType: { key: 'string', value: 'int32' }
      });
      fieldComparator.compare(mapField(), mapField(), findings);

      expect(findings.getAllFindings()).toEqual([]);
    });

    it('should allow version updates inside map values', () => {
      const original = makeField({
        repeated: true,
        protoType: 'TYPE_MESSAGE',
        typeName: '.example.Book.ShelvesEntry',
        isMapType: true,
        mapEntryType: { key: 'TYPE_STRING', value: '.example.v1.Shelf' },
        apiVersion: 'v1'
      });
      const updated = makeField({
        ...original,
        mapEntryType: { key: 'TYPE_STRING', value: '.example.v1beta1.Shelf' },
        apiVersion: 'v1beta1'
      });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings()).toEqual([]);
    });
  });

  describe('oneof', () => {
    it('should report a field moved out of a oneof', () => {
      const fieldOneof = makeField({ name: 'Foo', oneofName: 'choice' });
      const fieldNotOneof = makeField({ name: 'Foo' });
      fieldComparator.compare(fieldOneof, fieldNotOneof, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_ONEOF_REMOVAL);
      expect(all[0]?.changeType).toBe(ChangeType.MAJOR);
      expect(all[0]?.message).toBe('An existing field `Foo` is moved out of One-of.');
    });

    it('should report a field moved into a oneof', () => {
      fieldComparator.compare(makeField({ name: 'Foo' }), makeField({ name: 'Foo', oneofName: 'choice' }), findings);

      const all = findings.getAllFindings();
      expect(all[0]?.category).toBe(FindingCategory.FIELD_ONEOF_ADDITION);
      expect(all[0]?.message).toBe('An existing field `Foo` is moved into One-of.');
    });

    it('should report proto3 optional to required as major', () => {
      const original = makeField({ oneofName: '_my_field', isOptionalSingular: true });
      const updated = makeField({ oneofName: 'choice', isOptionalSingular: false });
      fieldComparator.compare(original, updated, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.category).toBe(FindingCategory.FIELD_PROTO3_OPTIONAL_CHANGE);
      expect(all[0]?.changeType).toBe(ChangeType.MAJOR);
      expect(all[0]?.message).toBe('Proto3 optional state of an existing field `my_field` is changed to required.');
    });

    it('should report a change to proto3 optional as minor', () => {
      const original = makeField({ oneofName: 'choice', isOptionalSingular: false });
      const updated = makeField({ oneofName: '_my_field', isOptionalSingular: true });
      fieldComparator.compare(original, updated, findings);

      const all = findings.getAllFindings();
      expect(all).toHaveLength(1);
      expect(all[0]?.changeType).toBe(ChangeType.MINOR);
      expect(all[0]?.message).toBe('An existing field `my_field` is changed to proto3 optional.');
    });
  });

  describe('locations and determinism', () => {
    it('should locate changes on the updated field', () => {
      const original = makeField({ protoType: 'TYPE_INT32', file: 'a.proto', line: 3 });
      const updated = makeField({ protoType: 'TYPE_BOOL', file: 'b.proto', line: 7 });
      fieldComparator.compare(original, updated, findings);

      expect(findings.getAllFindings()[0]?.location).toEqual({ file: 'b.proto', line: 7 });
    });

    it('should produce identical findings on repeated runs', () => {
      const original = makeField({ repeated: true, required: false, oneofName: 'choice' });
      const updated = makeField({ repeated: false, required: true });
      const other = new FindingContainer();

      fieldComparator.compare(original, updated, findings);
      fieldComparator.compare(original, updated, other);

      expect(other.getAllFindings()).toEqual(findings.getAllFindings());
      expect(findings.size).toBe(3);
    });
  });
});

describe('type name helpers', () => {
  it('should swap whole version segments only', () => {
    expect(transformTypeName('.example.v1.Enum', 'v1', 'v1beta1')).toBe('.example.v1beta1.Enum');
    expect(transformTypeName('.example.v1.Enumv1', 'v1', 'v2')).toBe('.example.v2.Enumv1');
  });

  it('should require both versions for tolerance', () => {
    expect(isEquivalentTypeName('.a.v1.X', '.a.v1.X', undefined, undefined)).toBe(true);
    expect(isEquivalentTypeName('.a.v1.X', '.a.v2.X', 'v1', undefined)).toBe(false);
    expect(isEquivalentTypeName('.a.v1.X', '.a.v2.X', 'v1', 'v2')).toBe(true);
  });
});
