// Configuration file schema and defaults.

import { z } from 'zod';
import { DEFAULT_ERROR_DELAY_MS, DEFAULT_REFRESH_RATE_MS, HOUR_MS, MINUTE_MS } from '../core/backoff.js';
import { DEFAULT_UNMANAGED_DOMAINS } from '../controller/policy-controller.js';
import type { LogLevel } from '../utils/logger.js';

export const MIN_REFRESH_RATE_MS = 30 * MINUTE_MS;
export const MAX_REFRESH_RATE_MS = 24 * HOUR_MS;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const sourceSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['user', 'device']),
  wait_for_policy_fetch: z.boolean().optional(),
});

export const syncConfigSchema = z.object({
  version: z.literal(1),
  server_url: z.string().url(),
  refresh_rate_ms: z.number().int().positive().optional(),
  error_delay_ms: z.number().int().positive().optional(),
  request_timeout_ms: z.number().int().positive().optional(),
  unmanaged_domains: z.array(z.string().min(1)).optional(),
  cache_dir: z.string().min(1).optional(),
  wait_for_policy_fetch: z.boolean().optional(),
  log_level: logLevelSchema.optional(),
  sources: z.array(sourceSchema).min(1).optional(),
});

export type SyncConfig = z.infer<typeof syncConfigSchema>;

export interface SourceConfig {
  name: string;
  kind: 'user' | 'device';
  waitForPolicyFetch: boolean;
}

/**
 * Configuration with every default applied.
 */
export interface ResolvedSyncConfig {
  serverUrl: string;
  refreshRateMs: number;
  errorDelayMs: number;
  requestTimeoutMs: number;
  unmanagedDomains: string[];
  /** Where caches persist; no persistence when absent. */
  cacheDir?: string;
  logLevel: LogLevel;
  /** In precedence order, highest first. */
  sources: SourceConfig[];
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export function clampRefreshRate(refreshRateMs: number): number {
  return Math.min(Math.max(refreshRateMs, MIN_REFRESH_RATE_MS), MAX_REFRESH_RATE_MS);
}

export function resolveSyncConfig(config: SyncConfig): ResolvedSyncConfig {
  const waitDefault = config.wait_for_policy_fetch ?? false;
  const sources: z.infer<typeof sourceSchema>[] = config.sources ?? [{ name: 'user', kind: 'user' }];
  return {
    serverUrl: config.server_url.replace(/\/$/, ''),
    refreshRateMs: clampRefreshRate(config.refresh_rate_ms ?? DEFAULT_REFRESH_RATE_MS),
    errorDelayMs: config.error_delay_ms ?? DEFAULT_ERROR_DELAY_MS,
    requestTimeoutMs: config.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
    unmanagedDomains: config.unmanaged_domains ?? [...DEFAULT_UNMANAGED_DOMAINS],
    cacheDir: config.cache_dir,
    logLevel: config.log_level ?? 'info',
    sources: sources.map((source) => ({
      name: source.name,
      kind: source.kind,
      waitForPolicyFetch: source.wait_for_policy_fetch ?? waitDefault,
    })),
  };
}
