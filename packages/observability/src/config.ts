/**
 * Observability configuration: defaults, JSON file loading, environment
 * overrides and validation.
 *
 * Resolution order (later wins): built-in defaults, the JSON file, then
 * VIGIL_HANDLERS / VIGIL_LOG_LEVEL / VIGIL_LOG_PATH / VIGIL_DB_PATH.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError } from '@vigil/core';
import { LOG_LEVELS } from './console-handler.js';
import type { LogLevel } from './console-handler.js';

export const HANDLER_NAMES = ['console', 'metrics', 'tracing', 'file', 'sqlite', 'memory', 'noop'] as const;
export type HandlerName = (typeof HANDLER_NAMES)[number];

export interface ObservabilityConfig {
  /** Handler names to activate (e.g. ["console", "metrics"]). */
  handlers: string[];
  /** Minimum log level for console output. */
  logLevel: LogLevel;
  /** Path for the JSONL file handler. */
  logPath?: string;
  /** Max log file size in bytes before rotation. */
  maxLogSize?: number;
  /** Path for the SQLite store (':memory:' allowed). */
  dbPath?: string;
  /** Observations whose name starts with one of these are not recorded. */
  disabledObservations: string[];
  /** Low-cardinality key values added to every observation. */
  commonKeyValues: Record<string, string>;
}

export function getVigilDir(): string {
  return resolve(homedir(), '.vigil');
}

export function getConfigPath(): string {
  return join(getVigilDir(), 'config.json');
}

export function getDefaultConfig(): ObservabilityConfig {
  return {
    handlers: ['console'],
    logLevel: 'info',
    disabledObservations: [],
    commonKeyValues: {},
  };
}

/**
 * Load configuration from `path` (default ~/.vigil/config.json). A missing
 * file yields the defaults plus environment overrides.
 */
export function loadConfig(
  path: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): ObservabilityConfig {
  let fromFile: Record<string, unknown> = {};
  if (existsSync(path)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Invalid JSON in ${path}: ${message}`, { path });
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${path} must contain a JSON object`, { path });
    }
    fromFile = parsed;
  }

  const merged: Record<string, unknown> = { ...getDefaultConfig(), ...fromFile };
  const defaults = getDefaultConfig();
  if (isRecord(fromFile['commonKeyValues'])) {
    merged['commonKeyValues'] = { ...defaults.commonKeyValues, ...fromFile['commonKeyValues'] };
  }

  applyEnvOverrides(merged, env);
  return validateConfig(merged);
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  const handlers = env['VIGIL_HANDLERS'];
  if (handlers !== undefined) {
    config['handlers'] = handlers
      .split(',')
      .map((h) => h.trim())
      .filter((h) => h.length > 0);
  }
  const logLevel = env['VIGIL_LOG_LEVEL'];
  if (logLevel !== undefined) config['logLevel'] = logLevel;
  const logPath = env['VIGIL_LOG_PATH'];
  if (logPath !== undefined) config['logPath'] = logPath;
  const dbPath = env['VIGIL_DB_PATH'];
  if (dbPath !== undefined) config['dbPath'] = dbPath;
}

/** Check every field and return a typed config, or throw ConfigError. */
export function validateConfig(raw: Record<string, unknown>): ObservabilityConfig {
  const handlers = raw['handlers'];
  if (!Array.isArray(handlers) || !handlers.every((h): h is string => typeof h === 'string')) {
    throw new ConfigError('handlers must be an array of strings', { field: 'handlers' });
  }

  for (const name of handlers) {
    if (!isHandlerName(name)) {
      console.warn(
        `[observability] config lists unknown handler "${name}" (known: ${HANDLER_NAMES.join(', ')})`,
      );
    }
  }

  const logLevel = raw['logLevel'];
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`logLevel must be one of ${LOG_LEVELS.join(', ')}`, {
      field: 'logLevel',
      value: logLevel,
    });
  }

  const config: ObservabilityConfig = {
    handlers,
    logLevel,
    disabledObservations: stringArray(raw['disabledObservations'], 'disabledObservations'),
    commonKeyValues: stringRecord(raw['commonKeyValues'], 'commonKeyValues'),
  };

  const logPath = raw['logPath'];
  if (logPath !== undefined) {
    if (typeof logPath !== 'string' || logPath.length === 0) {
      throw new ConfigError('logPath must be a non-empty string', { field: 'logPath' });
    }
    config.logPath = logPath;
  }

  const maxLogSize = raw['maxLogSize'];
  if (maxLogSize !== undefined) {
    if (typeof maxLogSize !== 'number' || !Number.isInteger(maxLogSize) || maxLogSize <= 0) {
      throw new ConfigError('maxLogSize must be a positive integer', {
        field: 'maxLogSize',
        value: maxLogSize,
      });
    }
    config.maxLogSize = maxLogSize;
  }

  const dbPath = raw['dbPath'];
  if (dbPath !== undefined) {
    if (typeof dbPath !== 'string' || dbPath.length === 0) {
      throw new ConfigError('dbPath must be a non-empty string', { field: 'dbPath' });
    }
    config.dbPath = dbPath;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHandlerName(value: string): value is HandlerName {
  return HANDLER_NAMES.some((name) => name === value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function stringArray(value: unknown, field: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${field} must be an array of strings`, { field });
  }
  return value;
}

function stringRecord(value: unknown, field: string): Record<string, string> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${field} must be an object of strings`, { field });
  }
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      throw new ConfigError(`${field}.${key} must be a string`, { field, key });
    }
    out[key] = v;
  }
  return out;
}
