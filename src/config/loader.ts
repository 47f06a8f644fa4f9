/**
 * Configuration loader for the content index.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Startup validation (fatal on error)
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ContentConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONTENT_CONFIG_PATH or './content.config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

// `${NAME}` or `${NAME:-fallback}`; group 1 is the name, group 2 the fallback
const ENV_REFERENCE = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Expand `${NAME}` references in a config value from `process.env`.
 *
 * A reference to an unset variable takes its `:-` fallback when it has one
 * and becomes an empty string (with a warning) when it does not.
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_REFERENCE, (_reference: string, name: string, fallback: string | undefined) => {
    const fromEnv = process.env[name];
    if (fromEnv !== undefined) {
      return fromEnv;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    console.warn(`Environment variable ${name} is not set and has no default`);
    return '';
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Apply substituteEnvVars to every string in parsed YAML.
 */
function expandEnvReferences(parsed: unknown): unknown {
  if (typeof parsed === 'string') {
    return substituteEnvVars(parsed);
  }
  if (Array.isArray(parsed)) {
    return parsed.map(expandEnvReferences);
  }
  if (isRecord(parsed)) {
    return Object.fromEntries(Object.entries(parsed).map(([key, value]) => [key, expandEnvReferences(value)]));
  }
  return parsed;
}

function readString(raw: Record<string, unknown>, key: keyof ContentConfig, fallback: string): string {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigValidationError('must be a non-empty string', key, value);
  }
  return value;
}

/**
 * Read a recheck interval. Numeric strings (as produced by env
 * substitution) are accepted.
 */
function readInterval(raw: Record<string, unknown>, key: keyof ContentConfig, fallback: number): number {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }

  let interval: number;
  if (typeof value === 'number') {
    interval = value;
  } else if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    interval = Number(value);
  } else {
    throw new ConfigValidationError('must be a positive integer (milliseconds)', key, value);
  }

  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigValidationError('must be a positive integer (milliseconds)', key, value);
  }
  return interval;
}

function readRemoteUrl(raw: Record<string, unknown>): string | null {
  const value = raw.remoteRepositoryUrl;
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ConfigValidationError('must be a string', 'remoteRepositoryUrl', value);
  }
  return value.trim() === '' ? null : value;
}

/**
 * Validate a raw startup configuration and fill in defaults.
 *
 * @throws ConfigValidationError on any invalid field; the process should not
 *   start serving with an invalid configuration
 */
export function validateStartupConfig(raw: unknown): ContentConfig {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_CONFIG };
  }
  if (!isRecord(raw)) {
    throw new ConfigValidationError('must be an object', '', raw);
  }

  const config: ContentConfig = {
    rootPath: readString(raw, 'rootPath', DEFAULT_CONFIG.rootPath),
    staticAssetsFolderName: readString(raw, 'staticAssetsFolderName', DEFAULT_CONFIG.staticAssetsFolderName),
    cacheName: readString(raw, 'cacheName', DEFAULT_CONFIG.cacheName),
    indexCacheName: readString(raw, 'indexCacheName', DEFAULT_CONFIG.indexCacheName),
    remoteRepositoryUrl: readRemoteUrl(raw),
    recheckPendingFileEventsInterval: readInterval(
      raw,
      'recheckPendingFileEventsInterval',
      DEFAULT_CONFIG.recheckPendingFileEventsInterval
    ),
    recheckPendingRemoteEventsInterval: readInterval(
      raw,
      'recheckPendingRemoteEventsInterval',
      DEFAULT_CONFIG.recheckPendingRemoteEventsInterval
    ),
  };

  if (config.cacheName === config.indexCacheName) {
    throw new ConfigValidationError('must differ from cacheName', 'indexCacheName', config.indexCacheName);
  }

  // Local changes must be picked up more often than remote ones.
  if (
    config.remoteRepositoryUrl !== null &&
    config.recheckPendingFileEventsInterval >= config.recheckPendingRemoteEventsInterval
  ) {
    throw new ConfigValidationError(
      'must be less than recheckPendingRemoteEventsInterval when remoteRepositoryUrl is set',
      'recheckPendingFileEventsInterval',
      config.recheckPendingFileEventsInterval
    );
  }

  return config;
}

/**
 * Load configuration from a YAML file.
 *
 * A relative `rootPath` is resolved against the config file's directory.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ContentConfig> {
  const configPath = options.configPath
    ?? process.env.CONTENT_CONFIG_PATH
    ?? './content.config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = validateStartupConfig(expandEnvReferences(parsed));

  return isAbsolute(config.rootPath)
    ? config
    : { ...config, rootPath: resolve(dirname(absolutePath), config.rootPath) };
}
