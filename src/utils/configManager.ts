/**
 * Configuration Manager
 * Merges caller settings over the defaults and applies logging settings
 */

import * as path from 'path';
import { LogLevel, logger } from './logger';
import { PartialSettings, Settings, defaultSettings } from './types';

/**
 * Map string log level to LogLevel enum
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  verbose: LogLevel.VERBOSE
};

export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVEL_MAP[value?.toLowerCase() ?? 'info'] ?? LogLevel.INFO;
}

/**
 * Expands variables like ${workspaceFolder} and ${env:NAME} in a path
 */
export function expandVariables(value: string, workspaceFolder: string = ''): string {
  const workspaceFolderBasename = workspaceFolder ? path.basename(workspaceFolder) : '';
  return value
    .replace(/\$\{workspaceRoot\}/g, workspaceFolder)
    .replace(/\$\{workspaceFolder\}/g, workspaceFolder)
    .replace(/\$\{workspaceFolderBasename\}/g, workspaceFolderBasename)
    .replace(/\$\{env(?::|\.)([^}]+)\}/g, (_: string, name: string) => process.env[name] || '');
}

function expandPathSetting(value: string | undefined, workspaceFolder: string): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  return expandVariables(trimmed, workspaceFolder) || undefined;
}

/**
 * Build complete settings from a partial override.
 * Path settings are expanded; the logger picks up the level and verbosity.
 */
export function resolveSettings(overrides: PartialSettings = {}, workspaceFolder: string = ''): Settings {
  const buf = { ...defaultSettings.buf, ...overrides.buf };
  const settings: Settings = {
    buf: {
      ...buf,
      path: expandPathSetting(buf.path, workspaceFolder) ?? defaultSettings.buf.path
    },
    diagnostics: { ...defaultSettings.diagnostics, ...overrides.diagnostics },
    logLevel: overrides.logLevel ?? defaultSettings.logLevel,
    verboseLogging: overrides.verboseLogging ?? defaultSettings.verboseLogging
  };

  logger.setLevel(parseLogLevel(settings.logLevel));
  logger.setVerboseLogging(settings.verboseLogging);
  logger.debug(`Settings resolved: buf.path=${settings.buf.path}, buf.timeout=${settings.buf.timeout}, logLevel=${settings.logLevel}`);

  return settings;
}
