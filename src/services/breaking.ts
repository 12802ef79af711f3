/**
 * Breaking Change Detection for Protocol Buffers
 * Compares an updated descriptor set against the original one and collects findings
 */

import { Diagnostic } from 'vscode-languageserver/node';
import { compareFileSets } from '../comparators/fileSet';
import { FileDescriptorSetJson } from '../core/descriptorSchema';
import { FileView } from '../core/descriptors';
import { FindingContainer } from '../core/findings';
import { wrapFileDescriptorSet } from '../core/wrappers';
import { toDiagnostics } from '../providers/diagnostics';
import { resolveSettings } from '../utils/configManager';
import { logger } from '../utils/logger';
import { PartialSettings, Settings } from '../utils/types';
import { DescriptorLoader } from './descriptorLoader';

export class BreakingChangeDetector {
  private settings: Settings;

  constructor(
    settings: PartialSettings = {},
    private readonly loader: DescriptorLoader = new DescriptorLoader()
  ) {
    this.settings = resolveSettings(settings);
    this.applyLoaderSettings();
  }

  updateSettings(settings: PartialSettings): void {
    this.settings = resolveSettings({
      buf: { ...this.settings.buf, ...settings.buf },
      diagnostics: { ...this.settings.diagnostics, ...settings.diagnostics },
      logLevel: settings.logLevel ?? this.settings.logLevel,
      verboseLogging: settings.verboseLogging ?? this.settings.verboseLogging
    });
    this.applyLoaderSettings();
  }

  getSettings(): Readonly<Settings> {
    return this.settings;
  }

  /**
   * Compare two already-wrapped schema trees into a fresh container
   */
  compareViews(originalFiles: readonly FileView[], updatedFiles: readonly FileView[]): FindingContainer {
    const findings = new FindingContainer();
    const startTime = Date.now();
    compareFileSets(originalFiles, updatedFiles, findings);

    logger.info(
      `Breaking change detection finished: ${findings.getActionableFindings().length} breaking, ${findings.size} total`
    );
    logger.verboseWithContext('Comparison complete', {
      operation: 'detect',
      duration: Date.now() - startTime,
      originalFiles: originalFiles.length,
      updatedFiles: updatedFiles.length
    });
    return findings;
  }

  /**
   * Compare two descriptor sets
   */
  detect(original: FileDescriptorSetJson, updated: FileDescriptorSetJson): FindingContainer {
    return this.compareViews(wrapFileDescriptorSet(original), wrapFileDescriptorSet(updated));
  }

  /**
   * Build descriptor sets for both directories with buf, then compare them
   */
  async detectFromDirectories(originalDir: string, updatedDir: string): Promise<FindingContainer> {
    logger.info(`Detecting breaking changes: ${originalDir} -> ${updatedDir}`);
    const [original, updated] = await Promise.all([
      this.loader.load(originalDir),
      this.loader.load(updatedDir)
    ]);
    return this.detect(original, updated);
  }

  /**
   * Diagnostics for the findings, keyed by document URI
   * @param root - Directory the proto file names are relative to
   */
  toDiagnostics(findings: FindingContainer, root?: string): Map<string, Diagnostic[]> {
    return toDiagnostics(findings.getAllFindings(), this.settings.diagnostics, root);
  }

  private applyLoaderSettings(): void {
    this.loader.updateSettings({
      path: this.settings.buf.path,
      timeout: this.settings.buf.timeout,
      excludeImports: this.settings.buf.excludeImports
    });
  }
}
