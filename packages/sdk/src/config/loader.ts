// Locate, parse and validate the sync configuration file.

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, toError } from '../core/errors.js';
import { isLogLevel } from '../utils/logger.js';
import { resolveSyncConfig, syncConfigSchema, type ResolvedSyncConfig } from './schema.js';

const CONFIG_YAML = 'policy-sync.yaml';
const CONFIG_YML = 'policy-sync.yml';
const CONFIG_JSON = 'policy-sync.json';

export const ENV_SERVER_URL = 'POLICY_SYNC_SERVER_URL';
export const ENV_LOG_LEVEL = 'POLICY_SYNC_LOG_LEVEL';

/**
 * Find the config file in `dir`, or null.
 */
export function findSyncConfig(dir: string = process.cwd()): string | null {
  for (const name of [CONFIG_YAML, CONFIG_YML, CONFIG_JSON]) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Validate an already-parsed document and apply defaults and environment
 * overrides.
 */
export function parseSyncConfig(
  document: unknown,
  env: NodeJS.ProcessEnv = process.env,
  path?: string
): ResolvedSyncConfig {
  const withEnv = applyEnvOverrides(document, env);
  const parsed = syncConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    throw new ConfigError(`Invalid policy sync config: ${where}${first?.message ?? 'invalid'}`, {
      path,
      issues: parsed.error.issues,
    });
  }
  return resolveSyncConfig(parsed.data);
}

export function loadSyncConfig(path: string, env: NodeJS.ProcessEnv = process.env): ResolvedSyncConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, { path });
  }

  let document: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    document = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path}: ${toError(err).message}`, { path });
  }

  return parseSyncConfig(document, env, path);
}

function applyEnvOverrides(document: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return document;
  }

  const result: Record<string, unknown> = { ...document };
  const serverUrl = env[ENV_SERVER_URL];
  if (serverUrl) {
    result.server_url = serverUrl;
  }
  const logLevel = env[ENV_LOG_LEVEL];
  if (logLevel && isLogLevel(logLevel)) {
    result.log_level = logLevel;
  }
  return result;
}
