/**
 * Decoded policy of one source, with the freshness and readiness metadata
 * the controller and providers rely on.
 *
 * @module cache/policy-cache
 */

import type { Logger } from '../utils/logger.js';
import { toError } from '../core/errors.js';
import type { PolicyNotifier, SubsystemState, ErrorDetails } from '../notifier/policy-notifier.js';
import { PolicyMap, type PublicKeyVersion } from '../types/policy.js';
import type { PolicyFetchResponse } from '../types/protocol.js';
import type { PersistedPolicy, PolicyCacheStore } from './backing-store.js';
import type { PolicyDecoder } from './decoder.js';

export interface PolicyCacheObserver {
  onCacheUpdate(cache: PolicyCache): void;
  /** Called synchronously from `dispose()`; the cache must be dropped. */
  onCacheGoingAway(cache: PolicyCache): void;
}

export interface PolicyCacheOptions {
  /** Identifies the source in logs. */
  name: string;
  decode: PolicyDecoder;
  logger: Logger;
  store?: PolicyCacheStore;
  /**
   * Stay not-ready after loading until a fetch attempt has an outcome.
   * When false the cache is ready as soon as the load finishes.
   */
  waitForPolicyFetch?: boolean;
  /** Reject responses whose timestamp lies in the future. Default true. */
  checkTimestampValidity?: boolean;
  notifier?: PolicyNotifier;
  clock?: () => number;
}

export class PolicyCache {
  readonly name: string;

  private policies: PolicyMap = PolicyMap.EMPTY;
  private lastRefreshTime: number | null = null;
  private unmanaged = false;
  private machineIdIsMissing = false;
  private publicKeyVersion: PublicKeyVersion = { version: 0, valid: false };

  private loaded = false;
  private loading: Promise<void> | null = null;
  private fetchSettled = false;
  private ready = false;
  private disposed = false;
  private rejectedResponses = 0;

  private readonly decode: PolicyDecoder;
  private readonly logger: Logger;
  private readonly store?: PolicyCacheStore;
  private readonly waitForPolicyFetch: boolean;
  private readonly checkTimestampValidity: boolean;
  private readonly notifier?: PolicyNotifier;
  private readonly now: () => number;
  private readonly observers = new Set<PolicyCacheObserver>();

  constructor(options: PolicyCacheOptions) {
    this.name = options.name;
    this.decode = options.decode;
    this.logger = options.logger;
    this.store = options.store;
    this.waitForPolicyFetch = options.waitForPolicyFetch ?? false;
    this.checkTimestampValidity = options.checkTimestampValidity ?? true;
    this.notifier = options.notifier;
    this.now = options.clock ?? Date.now;
  }

  policy(): PolicyMap {
    return this.policies;
  }

  lastPolicyRefreshTime(): number | null {
    return this.lastRefreshTime;
  }

  isUnmanaged(): boolean {
    return this.unmanaged;
  }

  machineIdMissing(): boolean {
    return this.machineIdIsMissing;
  }

  isReady(): boolean {
    return this.ready;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  getRejectedResponseCount(): number {
    return this.rejectedResponses;
  }

  getPublicKeyVersion(): number | undefined {
    return this.publicKeyVersion.valid ? this.publicKeyVersion.version : undefined;
  }

  /**
   * Populate from the backing store. Always completes, even when the store
   * fails or holds garbage.
   */
  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadFromStore()
        .catch((error: unknown) => {
          this.logger.warn('Unexpected failure while loading policy', {
            cache: this.name,
            error: toError(error).message,
          });
        })
        .finally(() => {
          this.loaded = true;
          if (this.updateReadiness()) {
            this.notifyObservers();
          }
        });
    }
    return this.loading;
  }

  setPolicy(response: PolicyFetchResponse): boolean {
    const result = this.decode(response);
    if (!result.ok) {
      this.reject('Discarding undecodable policy response', { error: result.error.message });
      return false;
    }

    const decoded = result.value;
    const now = this.now();
    if (this.checkTimestampValidity && decoded.timestamp > now) {
      this.reject('Discarding policy with a timestamp in the future', {
        timestamp: decoded.timestamp,
        now,
      });
      return false;
    }

    this.unmanaged = false;
    this.policies = decoded.policies;
    this.lastRefreshTime = decoded.timestamp;
    this.publicKeyVersion = decoded.publicKeyVersion;
    this.machineIdIsMissing = decoded.machineIdMissing;
    this.fetchSettled = true;

    this.logger.debug('Policy applied', {
      cache: this.name,
      policyCount: decoded.policies.size,
      timestamp: decoded.timestamp,
    });

    this.persist({ kind: 'policy', response, storedAt: now });
    this.inform('success', 'no_details');
    this.updateReadiness();
    this.notifyObservers();
    return true;
  }

  setUnmanaged(timestamp: number = this.now()): void {
    this.policies = PolicyMap.EMPTY;
    this.unmanaged = true;
    this.publicKeyVersion = { ...this.publicKeyVersion, valid: false };
    this.lastRefreshTime = timestamp;
    this.fetchSettled = true;

    this.persist({ kind: 'unmanaged', timestamp, storedAt: this.now() });
    this.updateReadiness();
    this.notifyObservers();
  }

  /**
   * Record that a fetch attempt reached an outcome, successful or not, and
   * let waiting observers proceed.
   */
  setFetchingDone(): void {
    this.fetchSettled = true;
    this.updateReadiness();
    this.notifyObservers();
  }

  reset(): void {
    this.lastRefreshTime = null;
    this.unmanaged = false;
    this.publicKeyVersion = { ...this.publicKeyVersion, valid: false };
    this.inform('unenrolled', 'no_details');
  }

  addObserver(observer: PolicyCacheObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: PolicyCacheObserver): void {
    this.observers.delete(observer);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const observer of [...this.observers]) {
      observer.onCacheGoingAway(this);
    }
    this.observers.clear();
  }

  private async loadFromStore(): Promise<void> {
    if (!this.store) return;

    let record: PersistedPolicy | null;
    try {
      record = await this.store.load();
    } catch (error) {
      this.logger.warn('Failed to load persisted policy', {
        cache: this.name,
        error: toError(error).message,
      });
      return;
    }

    if (!record) return;

    // A fetch that finished while the store was being read is newer.
    if (this.lastRefreshTime !== null || this.unmanaged) {
      this.logger.debug('Ignoring persisted policy, a fetch result is already applied', {
        cache: this.name,
      });
      return;
    }

    if (record.kind === 'unmanaged') {
      this.unmanaged = true;
      this.lastRefreshTime = record.timestamp;
      return;
    }

    const result = this.decode(record.response);
    if (!result.ok) {
      this.logger.warn('Persisted policy could not be decoded', {
        cache: this.name,
        error: result.error.message,
      });
      this.inform('local_error', 'policy_local_error');
      return;
    }

    this.policies = result.value.policies;
    this.lastRefreshTime = result.value.timestamp;
    this.publicKeyVersion = result.value.publicKeyVersion;
    this.machineIdIsMissing = result.value.machineIdMissing;
    this.inform('success', 'no_details');
  }

  /** Returns true when this call made the cache ready. */
  private updateReadiness(): boolean {
    if (this.ready || !this.loaded) return false;
    if (!this.fetchSettled && this.waitForPolicyFetch) return false;
    this.ready = true;
    this.logger.debug('Policy cache ready', { cache: this.name });
    return true;
  }

  // Observers only hear from a ready cache; earlier notifications are dropped.
  private notifyObservers(): void {
    if (!this.ready || this.disposed) return;
    for (const observer of [...this.observers]) {
      observer.onCacheUpdate(this);
    }
  }

  private reject(message: string, context: Record<string, unknown>): void {
    this.rejectedResponses++;
    this.logger.warn(message, { cache: this.name, ...context });
    this.inform('local_error', 'policy_local_error');
  }

  private inform(state: SubsystemState, details: ErrorDetails): void {
    this.notifier?.inform(state, details, 'policy_cache');
  }

  private persist(record: PersistedPolicy): void {
    if (!this.store) return;
    this.store.save(record).catch((error: unknown) => {
      this.logger.warn('Failed to persist policy', {
        cache: this.name,
        error: toError(error).message,
      });
    });
  }
}
