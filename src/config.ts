/**
 * Configuration loading for gridtui applications
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export const CONFIG_FILE = 'gridtui.yaml';
export const CONFIG_DEFAULTS_FILE = 'gridtui.defaults.yaml';
export const CONFIG_ENV_VAR = 'GRIDTUI_CONFIG';

export type BorderStyle = 'ascii' | 'unicode';

export interface TuiConfig {
  title: string;
  exitKey: string;
  cycleKeys: { forward: string; reverse: string };
  borders: BorderStyle;
  mouse: boolean;
  autoFocusButtons: boolean;
  refreshTimeoutMs: number | null;
  liveDebugKey: string | null;
  logging: { level: LogLevel; file: string | null };
}

export const DEFAULT_CONFIG: TuiConfig = {
  title: 'gridtui',
  exitKey: 'q',
  cycleKeys: { forward: 'tab', reverse: 'S-tab' },
  borders: 'ascii',
  mouse: true,
  autoFocusButtons: true,
  refreshTimeoutMs: null,
  liveDebugKey: null,
  logging: { level: 'info', file: null },
};

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve the config file path: an explicit path, then $GRIDTUI_CONFIG,
 * then gridtui.yaml in the working directory.
 */
export function getConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  if (explicitPath) return path.resolve(cwd, explicitPath);
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) return path.resolve(cwd, fromEnv);
  return path.join(cwd, CONFIG_FILE);
}

/**
 * Defaults file read before the user file, kept in the same directory
 */
export function getConfigDefaultsPath(configPath: string): string {
  return path.join(path.dirname(configPath), CONFIG_DEFAULTS_FILE);
}

function readYaml(filePath: string): RawConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid config in ${filePath}: must be a mapping`);
  }
  return parsed;
}

function mergeRaw(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

function stringKey(raw: RawConfig, key: string, fallback: string, label = key): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`Invalid config: ${label} must be a non-empty string`);
  }
  return value;
}

function nullableStringKey(raw: RawConfig, key: string, fallback: string | null, label = key): string | null {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (value === null) return null;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`Invalid config: ${label} must be a non-empty string or null`);
  }
  return value;
}

function booleanKey(raw: RawConfig, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid config: ${key} must be true or false`);
  }
  return value;
}

function sectionKey(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config: ${key} must be a mapping`);
  }
  return value;
}

/**
 * Check a parsed document against the known keys and fill in defaults.
 * Unknown keys are ignored.
 */
export function validateConfig(raw: RawConfig, defaults: TuiConfig = DEFAULT_CONFIG): TuiConfig {
  const borders = raw.borders ?? defaults.borders;
  if (borders !== 'ascii' && borders !== 'unicode') {
    throw new ConfigError('Invalid config: borders must be "ascii" or "unicode"');
  }

  const refresh = raw.refreshTimeoutMs === undefined ? defaults.refreshTimeoutMs : raw.refreshTimeoutMs;
  if (refresh !== null && (typeof refresh !== 'number' || !Number.isInteger(refresh) || refresh <= 0)) {
    throw new ConfigError('Invalid config: refreshTimeoutMs must be a positive integer or null');
  }

  const cycleKeys = sectionKey(raw, 'cycleKeys');
  const logging = sectionKey(raw, 'logging');
  const level = logging.level ?? defaults.logging.level;
  if (!isLogLevel(level)) {
    throw new ConfigError('Invalid config: logging.level must be one of debug, info, warn, error');
  }

  return {
    title: stringKey(raw, 'title', defaults.title),
    exitKey: stringKey(raw, 'exitKey', defaults.exitKey),
    cycleKeys: {
      forward: stringKey(cycleKeys, 'forward', defaults.cycleKeys.forward, 'cycleKeys.forward'),
      reverse: stringKey(cycleKeys, 'reverse', defaults.cycleKeys.reverse, 'cycleKeys.reverse'),
    },
    borders,
    mouse: booleanKey(raw, 'mouse', defaults.mouse),
    autoFocusButtons: booleanKey(raw, 'autoFocusButtons', defaults.autoFocusButtons),
    refreshTimeoutMs: refresh,
    liveDebugKey: nullableStringKey(raw, 'liveDebugKey', defaults.liveDebugKey),
    logging: {
      level,
      file: nullableStringKey(logging, 'file', defaults.logging.file, 'logging.file'),
    },
  };
}

/**
 * Load configuration: built-in defaults, then the defaults file, then the
 * user file. A missing file is skipped unless it was named explicitly.
 */
export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): TuiConfig {
  const configPath = getConfigPath(explicitPath, env, cwd);
  const named = Boolean(explicitPath) || Boolean(env[CONFIG_ENV_VAR]);
  let raw: RawConfig = {};

  const defaultsPath = getConfigDefaultsPath(configPath);
  if (fs.existsSync(defaultsPath)) {
    raw = readYaml(defaultsPath);
  }

  if (fs.existsSync(configPath)) {
    raw = mergeRaw(raw, readYaml(configPath));
  } else if (named) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  return validateConfig(raw);
}

/**
 * Serialize a configuration for writing a starter file.
 */
export function dumpConfig(config: TuiConfig): string {
  return yaml.dump(config);
}
