/**
 * Utils module barrel exports
 * Utility functions, types, and constants
 */

export { expandVariables, parseLogLevel, resolveSettings } from './configManager';
export * from './constants';
export { Logger, logger, LogLevel } from './logger';
export type { LogSink } from './logger';
export type { PartialSettings, Settings } from './types';
export { defaultSettings } from './types';
export { getErrorMessage, isDefined } from './utils';
