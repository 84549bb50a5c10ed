/**
 * Combines several policy caches into a single view for consumers.
 *
 * Caches are kept in precedence order: the first cache that defines a policy
 * decides its value. A refresh snapshots the current caches into a barrier;
 * consumers hear about the result once every cache in the barrier has
 * reported or gone away.
 *
 * @module provider/multi-source-provider
 */

import type { Logger } from '../utils/logger.js';
import type { PolicyCache, PolicyCacheObserver } from '../cache/policy-cache.js';
import { PolicyMap, type PolicyLevel } from '../types/policy.js';

export interface PolicyProviderObserver {
  onPolicyUpdated(provider: MultiSourcePolicyProvider): void;
  onProviderGoingAway?(provider: MultiSourcePolicyProvider): void;
}

export interface MultiSourcePolicyProviderOptions {
  /** Only entries of this level are exposed. */
  level: PolicyLevel;
  /** Ask the owning layer to start fetches on every underlying source. */
  requestRefresh: () => void;
  logger: Logger;
}

export class MultiSourcePolicyProvider implements PolicyCacheObserver {
  readonly level: PolicyLevel;

  private caches: PolicyCache[] = [];
  private readonly pendingCaches = new Set<PolicyCache>();
  private combined: PolicyMap = PolicyMap.EMPTY;
  private initializationComplete = true;
  private disposed = false;

  private readonly requestRefresh: () => void;
  private readonly logger: Logger;
  private readonly observers = new Set<PolicyProviderObserver>();

  constructor(options: MultiSourcePolicyProviderOptions) {
    this.level = options.level;
    this.requestRefresh = options.requestRefresh;
    this.logger = options.logger;
  }

  getPolicy(): PolicyMap {
    return this.combined;
  }

  isInitializationComplete(): boolean {
    return this.initializationComplete;
  }

  getCacheCount(): number {
    return this.caches.length;
  }

  hasPendingRefresh(): boolean {
    return this.pendingCaches.size > 0;
  }

  /** Add a source with the lowest precedence. */
  appendCache(cache: PolicyCache): void {
    this.caches = [...this.caches, cache];
    this.attach(cache);
  }

  /** Add a source that takes precedence over every current one. */
  prependCache(cache: PolicyCache): void {
    this.caches = [cache, ...this.caches];
    this.attach(cache);
  }

  refreshPolicies(): void {
    for (const cache of this.caches) {
      this.pendingCaches.add(cache);
    }
    if (this.pendingCaches.size === 0) {
      this.notifyObservers();
      return;
    }
    this.logger.debug('Refreshing policy sources', {
      level: this.level,
      pending: this.pendingCaches.size,
    });
    this.requestRefresh();
  }

  onCacheUpdate(cache: PolicyCache): void {
    this.pendingCaches.delete(cache);
    this.recombineCachesAndTriggerUpdate();
  }

  onCacheGoingAway(cache: PolicyCache): void {
    cache.removeObserver(this);
    this.caches = this.caches.filter((c) => c !== cache);
    this.pendingCaches.delete(cache);
    this.logger.debug('Policy source removed', { level: this.level, cache: cache.name });
    this.recombineCachesAndTriggerUpdate();
  }

  addObserver(observer: PolicyProviderObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: PolicyProviderObserver): void {
    this.observers.delete(observer);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const cache of this.caches) {
      cache.removeObserver(this);
    }
    this.caches = [];
    this.pendingCaches.clear();
    for (const observer of [...this.observers]) {
      observer.onProviderGoingAway?.(this);
    }
    this.observers.clear();
  }

  /**
   * Rebuild the combined map. Consumers are told right away unless a refresh
   * is still waiting on some source.
   */
  recombineCachesAndTriggerUpdate(): void {
    if (!this.initializationComplete) {
      this.initializationComplete = this.caches.every((cache) => cache.isReady());
    }

    let merged = PolicyMap.EMPTY;
    for (const cache of this.caches) {
      if (cache.isReady()) {
        merged = merged.mergeFrom(cache.policy());
      }
    }
    this.combined = merged.filterLevel(this.level);

    if (this.pendingCaches.size === 0) {
      this.notifyObservers();
    }
  }

  private attach(cache: PolicyCache): void {
    cache.addObserver(this);
    this.initializationComplete = this.initializationComplete && cache.isReady();
    this.recombineCachesAndTriggerUpdate();
  }

  private notifyObservers(): void {
    if (this.disposed) return;
    for (const observer of [...this.observers]) {
      observer.onPolicyUpdated(this);
    }
  }
}
