/**
 * Protocol Buffers breaking change detector
 * Public entry point
 */

export * from './core';
export * from './comparators';
export * from './services';
export { findingUri, toDiagnostic, toDiagnostics } from './providers/diagnostics';
export type { DiagnosticsOptions } from './providers/diagnostics';
export * from './utils';
