/**
 * Everything needed to keep one policy domain (user or device) in sync:
 * its cache, its controller and the notifier they report to.
 *
 * @module subsystem/policy-subsystem
 */

import type { Logger } from '../utils/logger.js';
import type { PolicyCacheStore } from '../cache/backing-store.js';
import { decodeJsonPolicyResponse, type PolicyDecoder } from '../cache/decoder.js';
import { PolicyCache } from '../cache/policy-cache.js';
import type { DeviceManagementService, DeviceTokenFetcher } from '../cloud/service.js';
import { clampRefreshRate } from '../config/schema.js';
import { PolicyController } from '../controller/policy-controller.js';
import { DEFAULT_ERROR_DELAY_MS, DEFAULT_REFRESH_RATE_MS } from '../core/backoff.js';
import type { Scheduler } from '../core/scheduler.js';
import type { IdentityStore } from '../identity/data-store.js';
import { PolicyNotifier } from '../notifier/policy-notifier.js';

export interface PolicySubsystemOptions {
  name: string;
  dataStore: IdentityStore;
  service: DeviceManagementService;
  tokenFetcher: DeviceTokenFetcher;
  logger: Logger;
  decode?: PolicyDecoder;
  store?: PolicyCacheStore;
  waitForPolicyFetch?: boolean;
  refreshRateMs?: number;
  errorDelayMs?: number;
  unmanagedDomains?: readonly string[];
  notifier?: PolicyNotifier;
  scheduler?: Scheduler;
  clock?: () => number;
  random?: () => number;
}

export class PolicySubsystem {
  readonly name: string;

  private readonly cache: PolicyCache;
  private readonly notifier: PolicyNotifier;
  private controller: PolicyController | null = null;
  private initializing: Promise<void> | null = null;
  private refreshRateMs: number;
  private disposed = false;

  constructor(private readonly options: PolicySubsystemOptions) {
    this.name = options.name;
    this.notifier = options.notifier ?? new PolicyNotifier();
    this.refreshRateMs = clampRefreshRate(options.refreshRateMs ?? DEFAULT_REFRESH_RATE_MS);
    this.cache = new PolicyCache({
      name: options.name,
      decode: options.decode ?? decodeJsonPolicyResponse,
      logger: options.logger,
      store: options.store,
      waitForPolicyFetch: options.waitForPolicyFetch,
      notifier: this.notifier,
      clock: options.clock,
    });
  }

  getCache(): PolicyCache {
    return this.cache;
  }

  getController(): PolicyController | null {
    return this.controller;
  }

  getNotifier(): PolicyNotifier {
    return this.notifier;
  }

  /**
   * Load the cache, then start the controller. The controller reads the
   * cache's refresh time, so it must not run before the load.
   */
  initialize(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.cache.load().then(() => {
        if (this.disposed) return;
        this.controller = new PolicyController({
          service: this.options.service,
          cache: this.cache,
          tokenFetcher: this.options.tokenFetcher,
          dataStore: this.options.dataStore,
          notifier: this.notifier,
          logger: this.options.logger,
          scheduler: this.options.scheduler,
          refreshRateMs: this.refreshRateMs,
          errorDelayMs: this.options.errorDelayMs ?? DEFAULT_ERROR_DELAY_MS,
          unmanagedDomains: this.options.unmanagedDomains,
          clock: this.options.clock,
          random: this.options.random,
        });
        this.options.logger.info('Policy subsystem started', {
          subsystem: this.name,
          state: this.controller.getState(),
        });
      });
    }
    return this.initializing;
  }

  refreshPolicies(): void {
    if (this.controller) {
      this.controller.refreshPolicies();
    } else {
      // Nothing can be fetched yet; let waiters see the current contents.
      this.cache.setFetchingDone();
    }
  }

  setRefreshRate(refreshRateMs: number): void {
    this.refreshRateMs = clampRefreshRate(refreshRateMs);
    this.controller?.setRefreshRate(this.refreshRateMs);
  }

  getRefreshRate(): number {
    return this.refreshRateMs;
  }

  reset(): void {
    this.cache.reset();
    this.controller?.reset();
  }

  /** Stops the controller before the cache goes away. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.controller?.dispose();
    this.controller = null;
    this.cache.dispose();
  }
}
