/**
 * The context object that owns every policy subsystem of a process and the
 * providers consumers read merged policy from.
 *
 * @module subsystem/connector
 */

import { join } from 'node:path';
import { createLogger, type Logger } from '../utils/logger.js';
import { FilePolicyCacheStore } from '../cache/backing-store.js';
import type { PolicyDecoder } from '../cache/decoder.js';
import { HttpDeviceManagementService } from '../cloud/http-service.js';
import type { DeviceManagementService, DeviceTokenFetcher } from '../cloud/service.js';
import type { ResolvedSyncConfig, SourceConfig } from '../config/schema.js';
import { PolicyDataStore } from '../identity/data-store.js';
import { MultiSourcePolicyProvider } from '../provider/multi-source-provider.js';
import { PolicySubsystem } from './policy-subsystem.js';

export interface PolicyConnectorOptions {
  logger: Logger;
}

export class PolicyConnector {
  readonly mandatoryProvider: MultiSourcePolicyProvider;
  readonly recommendedProvider: MultiSourcePolicyProvider;

  private subsystems: PolicySubsystem[] = [];
  private fetchQueued = false;
  private disposed = false;
  private readonly logger: Logger;

  constructor(options: PolicyConnectorOptions) {
    this.logger = options.logger;
    const requestRefresh = () => this.queueFetch();
    this.mandatoryProvider = new MultiSourcePolicyProvider({
      level: 'mandatory',
      requestRefresh,
      logger: this.logger,
    });
    this.recommendedProvider = new MultiSourcePolicyProvider({
      level: 'recommended',
      requestRefresh,
      logger: this.logger,
    });
  }

  /**
   * Register a subsystem below every existing one in precedence.
   */
  addSubsystem(subsystem: PolicySubsystem): void {
    if (this.subsystems.some((s) => s.name === subsystem.name)) {
      throw new Error(`Policy subsystem '${subsystem.name}' is already registered`);
    }
    this.subsystems = [...this.subsystems, subsystem];
    this.mandatoryProvider.appendCache(subsystem.getCache());
    this.recommendedProvider.appendCache(subsystem.getCache());
  }

  /**
   * Dispose a subsystem. Providers drop its cache, and any refresh waiting on
   * it completes.
   */
  removeSubsystem(name: string): boolean {
    const subsystem = this.getSubsystem(name);
    if (!subsystem) return false;
    this.subsystems = this.subsystems.filter((s) => s !== subsystem);
    subsystem.dispose();
    return true;
  }

  getSubsystem(name: string): PolicySubsystem | undefined {
    return this.subsystems.find((s) => s.name === name);
  }

  getSubsystems(): readonly PolicySubsystem[] {
    return this.subsystems;
  }

  async initialize(): Promise<void> {
    await Promise.all(this.subsystems.map((s) => s.initialize()));
    this.logger.info('Policy connector initialized', {
      subsystems: this.subsystems.map((s) => s.name),
      mandatoryComplete: this.mandatoryProvider.isInitializationComplete(),
      recommendedComplete: this.recommendedProvider.isInitializationComplete(),
    });
  }

  /**
   * Refresh both providers. Consumers of each hear once, after every source
   * has reported.
   */
  refreshPolicies(): void {
    this.mandatoryProvider.refreshPolicies();
    this.recommendedProvider.refreshPolicies();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const subsystem of this.subsystems) {
      subsystem.dispose();
    }
    this.subsystems = [];
    this.mandatoryProvider.dispose();
    this.recommendedProvider.dispose();
  }

  // Both providers ask for a fetch during one refresh; run it once.
  private queueFetch(): void {
    if (this.fetchQueued) return;
    this.fetchQueued = true;
    queueMicrotask(() => {
      this.fetchQueued = false;
      if (this.disposed) return;
      for (const subsystem of this.subsystems) {
        subsystem.refreshPolicies();
      }
    });
  }
}

export interface ConnectorDependencies {
  tokenFetcherFor(source: SourceConfig, dataStore: PolicyDataStore): DeviceTokenFetcher;
  dataStoreFor?(source: SourceConfig): PolicyDataStore;
  service?: DeviceManagementService;
  decode?: PolicyDecoder;
  logger?: Logger;
}

/**
 * Build a connector with one subsystem per configured source, in the
 * configured precedence order. Call `initialize()` on the result.
 */
export function createPolicyConnector(config: ResolvedSyncConfig, deps: ConnectorDependencies): PolicyConnector {
  const logger = deps.logger ?? createLogger(config.logLevel);
  const service =
    deps.service ??
    new HttpDeviceManagementService({
      config: { serverUrl: config.serverUrl, timeout: config.requestTimeoutMs },
      logger,
    });

  const connector = new PolicyConnector({ logger });
  for (const source of config.sources) {
    const dataStore =
      deps.dataStoreFor?.(source) ??
      (source.kind === 'device' ? PolicyDataStore.createForDevicePolicies() : PolicyDataStore.createForUserPolicies());

    connector.addSubsystem(
      new PolicySubsystem({
        name: source.name,
        dataStore,
        service,
        tokenFetcher: deps.tokenFetcherFor(source, dataStore),
        logger,
        decode: deps.decode,
        store: config.cacheDir ? new FilePolicyCacheStore(join(config.cacheDir, `${source.name}.json`)) : undefined,
        waitForPolicyFetch: source.waitForPolicyFetch,
        refreshRateMs: config.refreshRateMs,
        errorDelayMs: config.errorDelayMs,
        unmanagedDomains: config.unmanagedDomains,
      })
    );
  }
  return connector;
}
