/**
 * Type definitions for the breaking change detector
 * Centralized location for settings
 */

import { DEFAULT_CONFIG } from './constants';

/**
 * Configuration settings for breaking change detection
 */
export interface Settings {
  buf: {
    path: string;
    timeout: number;
    excludeImports: boolean;
  };
  diagnostics: {
    source: string;
    includeNonBreaking: boolean;
  };
  logLevel: string;
  verboseLogging: boolean;
}

/**
 * Settings as supplied by a caller: every section and key is optional
 */
export type PartialSettings = {
  [K in keyof Settings]?: Settings[K] extends object ? Partial<Settings[K]> : Settings[K];
};

/**
 * Default settings values
 */
export const defaultSettings: Settings = {
  buf: {
    path: DEFAULT_CONFIG.BUF_PATH,
    timeout: DEFAULT_CONFIG.LOAD_TIMEOUT_MS,
    excludeImports: false
  },
  diagnostics: {
    source: DEFAULT_CONFIG.DIAGNOSTIC_SOURCE,
    includeNonBreaking: false
  },
  logLevel: DEFAULT_CONFIG.LOG_LEVEL,
  verboseLogging: false
};
