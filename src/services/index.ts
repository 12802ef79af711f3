/**
 * Services module barrel exports
 * Descriptor loading (buf) and breaking change detection
 */

export { BreakingChangeDetector } from './breaking';
export { DescriptorLoader, parseDescriptorSet, spawnRunner } from './descriptorLoader';
export type { LoaderSettings, ProcessResult, ProcessRunner, RunOptions } from './descriptorLoader';
