/**
 * Configuration loader for Tollgate.
 * Reads config from $TOLLGATE_HOME/config.json, applies env var overrides,
 * and validates with Zod.
 *
 * Priority: env vars > config.json > Zod defaults
 */

import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { ConfigSchema, type Config } from './schema.js';

const log = createModuleLogger('config');

type RawConfig = Record<string, unknown>;

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the base directory for Tollgate configuration files.
 * Checks TOLLGATE_HOME first, then defaults to ~/.tollgate.
 */
export function homeDir(): string {
  return process.env.TOLLGATE_HOME ?? path.join(os.homedir(), '.tollgate');
}

export function configFilePath(): string {
  return path.join(homeDir(), 'config.json');
}

/**
 * Reads the raw config file from disk.
 * Returns an empty object if the file does not exist.
 */
async function readConfigFile(): Promise<RawConfig> {
  let raw: string;
  try {
    raw = await readFile(configFilePath(), 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.info('No config file found, using defaults');
      return {};
    }
    throw new ConfigError(`Failed to read config file: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file contains invalid JSON: ${message}`);
  }
  if (!isRawConfig(parsed)) {
    throw new ConfigError('Config file must contain a JSON object');
  }
  return parsed;
}

interface EnvOverride {
  envVar: string;
  section: string;
  key: string;
  numeric: boolean;
}

/** Supported environment overrides */
const ENV_OVERRIDES: readonly EnvOverride[] = [
  { envVar: 'TOLLGATE_HOST', section: 'gateway', key: 'host', numeric: false },
  { envVar: 'TOLLGATE_PORT', section: 'gateway', key: 'port', numeric: true },
  { envVar: 'TOLLGATE_DEADLINE_MS', section: 'request', key: 'deadlineMs', numeric: true },
  { envVar: 'TOLLGATE_RISK_URL', section: 'risk', key: 'baseUrl', numeric: false },
  { envVar: 'TOLLGATE_OUTPUT_URL', section: 'outputSafety', key: 'baseUrl', numeric: false },
  { envVar: 'TOLLGATE_SANDBOX_RUNTIME', section: 'sandbox', key: 'runtime', numeric: false },
  { envVar: 'TOLLGATE_SANDBOX_IMAGE', section: 'sandbox', key: 'image', numeric: false },
  { envVar: 'TOLLGATE_SANDBOX_TIMEOUT_MS', section: 'sandbox', key: 'timeoutMs', numeric: true },
];

/**
 * Applies environment variable overrides to the raw config object.
 * Numeric variables that do not parse are ignored with a warning.
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const merged = structuredClone(config);

  for (const override of ENV_OVERRIDES) {
    const value = env[override.envVar];
    if (value === undefined) continue;

    let resolved: string | number = value;
    if (override.numeric) {
      resolved = Number(value);
      if (Number.isNaN(resolved)) {
        log.warn({ envVar: override.envVar }, 'Ignoring non-numeric env override');
        continue;
      }
    }

    const existing = merged[override.section];
    const section: RawConfig = isRawConfig(existing) ? existing : {};
    section[override.key] = resolved;
    merged[override.section] = section;
  }

  return merged;
}

/**
 * Loads the configuration from disk, applies environment variable overrides,
 * and validates against the ConfigSchema.
 *
 * @throws {ConfigError} When the config file is malformed or validation fails
 */
export async function loadConfig(): Promise<Config> {
  const rawFile = await readConfigFile();
  const withEnv = applyEnvOverrides(rawFile);
  const result = ConfigSchema.safeParse(withEnv);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config validation failed: ${issues}`);
  }

  log.info('Configuration loaded successfully');
  return result.data;
}
