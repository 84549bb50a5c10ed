import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findSyncConfig, loadSyncConfig, parseSyncConfig } from '../../src/config/loader.js';
import { clampRefreshRate, MAX_REFRESH_RATE_MS, MIN_REFRESH_RATE_MS } from '../../src/config/schema.js';
import { ConfigError } from '../../src/core/errors.js';

const MINIMAL_YAML = `version: 1
server_url: https://dm.example/manage/
`;

describe('config loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'policy-sync-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('findSyncConfig', () => {
    it('returns null when there is no config', () => {
      expect(findSyncConfig(dir)).toBeNull();
    });

    it('prefers the YAML file', () => {
      writeFileSync(join(dir, 'policy-sync.json'), '{}');
      writeFileSync(join(dir, 'policy-sync.yaml'), MINIMAL_YAML);

      expect(findSyncConfig(dir)).toBe(join(dir, 'policy-sync.yaml'));
    });

    it('finds a JSON file', () => {
      writeFileSync(join(dir, 'policy-sync.json'), '{}');
      expect(findSyncConfig(dir)).toBe(join(dir, 'policy-sync.json'));
    });
  });

  describe('loadSyncConfig', () => {
    it('applies defaults to a minimal file', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, MINIMAL_YAML);

      expect(loadSyncConfig(path, {})).toEqual({
        serverUrl: 'https://dm.example/manage',
        refreshRateMs: 3 * 60 * 60 * 1000,
        errorDelayMs: 5 * 60 * 1000,
        requestTimeoutMs: 30_000,
        unmanagedDomains: ['@googlemail.com', '@gmail.com'],
        logLevel: 'info',
        sources: [{ name: 'user', kind: 'user', waitForPolicyFetch: false }],
      });
    });

    it('reads every option', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(
        path,
        `version: 1
server_url: https://dm.example/manage
refresh_rate_ms: 7200000
error_delay_ms: 60000
request_timeout_ms: 10000
unmanaged_domains:
  - "@consumer.example"
cache_dir: /var/cache/policy-sync
wait_for_policy_fetch: true
log_level: warn
sources:
  - name: device
    kind: device
  - name: user
    kind: user
    wait_for_policy_fetch: false
`
      );

      expect(loadSyncConfig(path, {})).toEqual({
        serverUrl: 'https://dm.example/manage',
        refreshRateMs: 7_200_000,
        errorDelayMs: 60_000,
        requestTimeoutMs: 10_000,
        unmanagedDomains: ['@consumer.example'],
        cacheDir: '/var/cache/policy-sync',
        logLevel: 'warn',
        sources: [
          { name: 'device', kind: 'device', waitForPolicyFetch: true },
          { name: 'user', kind: 'user', waitForPolicyFetch: false },
        ],
      });
    });

    it('reads a JSON file', () => {
      const path = join(dir, 'policy-sync.json');
      writeFileSync(path, JSON.stringify({ version: 1, server_url: 'https://dm.example' }));

      expect(loadSyncConfig(path, {}).serverUrl).toBe('https://dm.example');
    });

    it('clamps the refresh rate', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, `${MINIMAL_YAML}refresh_rate_ms: 60000\n`);

      expect(loadSyncConfig(path, {}).refreshRateMs).toBe(MIN_REFRESH_RATE_MS);
    });

    it('lets the environment override the server URL and log level', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, MINIMAL_YAML);

      const config = loadSyncConfig(path, {
        POLICY_SYNC_SERVER_URL: 'https://staging.example/manage',
        POLICY_SYNC_LOG_LEVEL: 'debug',
      });

      expect(config.serverUrl).toBe('https://staging.example/manage');
      expect(config.logLevel).toBe('debug');
    });

    it('ignores an unknown log level from the environment', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, MINIMAL_YAML);

      expect(loadSyncConfig(path, { POLICY_SYNC_LOG_LEVEL: 'loud' }).logLevel).toBe('info');
    });

    it('throws when the file is missing', () => {
      const path = join(dir, 'policy-sync.yaml');
      expect(() => loadSyncConfig(path, {})).toThrow(`Config file not found: ${path}`);
    });

    it('throws when the file cannot be parsed', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, 'version: [1\n');

      expect(() => loadSyncConfig(path, {})).toThrow(`Failed to parse ${path}: `);
    });

    it('names the invalid field', () => {
      const path = join(dir, 'policy-sync.yaml');
      writeFileSync(path, 'version: 1\nserver_url: not a url\n');

      try {
        loadSyncConfig(path, {});
        expect.unreachable('config should be rejected');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (!(error instanceof ConfigError)) return;
        expect(error.message).toBe('Invalid policy sync config: server_url: Invalid url');
        expect(error.path).toBe(path);
        expect(error.issues).toHaveLength(1);
      }
    });
  });

  describe('parseSyncConfig', () => {
    it('rejects a document that is not an object', () => {
      expect(() => parseSyncConfig(null, {})).toThrow('Invalid policy sync config: Expected object, received null');
    });

    it('rejects an unsupported version', () => {
      expect(() => parseSyncConfig({ version: 2, server_url: 'https://dm.example' }, {})).toThrow(
        /^Invalid policy sync config: version: /
      );
    });
  });

  it('clamps refresh rates to the supported range', () => {
    expect(clampRefreshRate(1)).toBe(MIN_REFRESH_RATE_MS);
    expect(clampRefreshRate(Number.MAX_SAFE_INTEGER)).toBe(MAX_REFRESH_RATE_MS);
    expect(clampRefreshRate(2 * 60 * 60 * 1000)).toBe(2 * 60 * 60 * 1000);
  });
});
