/**
 * Tests for the breaking change detector
 */

import * as path from 'path';
import { BreakingChangeDetector } from '../breaking';
import { DescriptorLoader, ProcessRunner } from '../descriptorLoader';
import { ChangeType, FindingCategory } from '../../core/findings';
import { DescriptorLoadError } from '../../core/errors';
import { FileDescriptorSetJson } from '../../core/descriptorSchema';
import { LIBRARY_FILE, librarySet } from '../../__tests__/fixtures/descriptorSets';

describe('BreakingChangeDetector', () => {
  const originalDir = __dirname;
  const updatedDir = path.resolve(__dirname, '..');

  const runner = jest.fn<ReturnType<ProcessRunner>, Parameters<ProcessRunner>>(async (_command, args) => ({
    code: 0,
    stdout: JSON.stringify(librarySet(args[1] === originalDir ? 'original' : 'updated')),
    stderr: '',
    timedOut: false
  }));

  let detector: BreakingChangeDetector;

  beforeEach(() => {
    runner.mockClear();
    detector = new BreakingChangeDetector({ logLevel: 'error' }, new DescriptorLoader({}, runner));
  });

  describe('detect', () => {
    it('should report every change between two revisions in order', () => {
      const findings = detector.detect(librarySet('original'), librarySet('updated'));

      expect(findings.getAllFindings().map(f => [f.category, f.changeType, f.message])).toEqual([
        [FindingCategory.FIELD_REMOVAL, ChangeType.MAJOR, 'An existing field `isbn` is removed.'],
        [FindingCategory.FIELD_TYPE_CHANGE, ChangeType.MAJOR, 'Type of an existing field `rating` is changed from `TYPE_INT32` to `TYPE_INT64`.'],
        [FindingCategory.FIELD_ADDITION, ChangeType.MINOR, 'A new field `subtitle` is added.'],
        [FindingCategory.ENUM_VALUE_NAME_CHANGE, ChangeType.MAJOR, 'Name of the EnumValue is changed from `FICTION` to `NOVEL`.'],
        [FindingCategory.MESSAGE_ADDITION, ChangeType.MINOR, 'A new message `Shelf` is added.'],
        [FindingCategory.ENUM_REMOVAL, ChangeType.MAJOR, 'An existing Enum `Format` is removed.']
      ]);
      expect(findings.getActionableFindings()).toHaveLength(4);
    });

    it('should report nothing for identical revisions', () => {
      const findings = detector.detect(librarySet('original'), librarySet('original'));
      expect(findings.size).toBe(0);
    });

    it('should pair revisions across an API version update', () => {
      const versioned = (version: string): FileDescriptorSetJson => ({
        file: [{
          name: `example/${version}/book.proto`,
          package: `example.${version}`,
          messageType: [{
            name: 'Book',
            field: [{
              name: 'status',
              number: 1,
              label: 'LABEL_OPTIONAL',
              type: 'TYPE_ENUM',
              typeName: `.example.${version}.Status`
            }]
          }],
          enumType: [{ name: 'Status', value: [{ name: 'STATUS_UNSPECIFIED', number: 0 }] }]
        }]
      });

      const findings = detector.detect(versioned('v1'), versioned('v1beta1'));
      expect(findings.getAllFindings()).toEqual([]);
    });

    it('should give the same result on every run', () => {
      const first = detector.detect(librarySet('original'), librarySet('updated'));
      const second = detector.detect(librarySet('original'), librarySet('updated'));

      expect(second.toJSON()).toEqual(first.toJSON());
    });
  });

  describe('detectFromDirectories', () => {
    it('should build both directories with buf and compare them', async () => {
      const findings = await detector.detectFromDirectories(originalDir, updatedDir);

      expect(runner).toHaveBeenCalledTimes(2);
      expect(runner).toHaveBeenCalledWith(
        'buf',
        ['build', originalDir, '--as-file-descriptor-set', '-o', '-#format=json'],
        { cwd: originalDir, timeout: 60000 }
      );
      expect(findings.size).toBe(6);
    });

    it('should pass buf settings to the loader', async () => {
      detector.updateSettings({ buf: { path: '/opt/buf/bin/buf', excludeImports: true } });
      await detector.detectFromDirectories(originalDir, updatedDir);

      expect(detector.getSettings().buf.timeout).toBe(60000);
      expect(runner).toHaveBeenCalledWith(
        '/opt/buf/bin/buf',
        ['build', updatedDir, '--as-file-descriptor-set', '-o', '-#format=json', '--exclude-imports'],
        { cwd: updatedDir, timeout: 60000 }
      );
    });

    it('should fail for a missing directory', async () => {
      await expect(detector.detectFromDirectories(path.join(originalDir, 'missing'), updatedDir))
        .rejects.toThrow(DescriptorLoadError);
    });
  });

  describe('toDiagnostics', () => {
    it('should group breaking findings by file', () => {
      const findings = detector.detect(librarySet('original'), librarySet('updated'));
      const diagnostics = detector.toDiagnostics(findings, '/work');

      expect([...diagnostics.keys()]).toEqual([`file:///work/${LIBRARY_FILE}`]);
      expect(diagnostics.get(`file:///work/${LIBRARY_FILE}`)?.map(d => d.code)).toEqual([
        'FIELD_REMOVAL',
        'FIELD_TYPE_CHANGE',
        'ENUM_VALUE_NAME_CHANGE',
        'ENUM_REMOVAL'
      ]);
    });

    it('should include non-breaking findings when configured', () => {
      detector.updateSettings({ diagnostics: { includeNonBreaking: true } });
      const findings = detector.detect(librarySet('original'), librarySet('updated'));
      const diagnostics = detector.toDiagnostics(findings, '/work');

      expect(diagnostics.get(`file:///work/${LIBRARY_FILE}`)).toHaveLength(6);
    });
  });
});
