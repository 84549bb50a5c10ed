/**
 * Drives token acquisition and policy fetches for one policy domain.
 *
 * The controller is a state machine with a single transition function,
 * {@link PolicyController.setState}. Each transition cancels outstanding work
 * and schedules the next step, so there is never more than one timer and one
 * request in flight per controller.
 *
 * @module controller/policy-controller
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../utils/logger.js';
import type { PolicyCache } from '../cache/policy-cache.js';
import type { DeviceManagementService, DeviceTokenFetcher, RequestJob } from '../cloud/service.js';
import {
  DEFAULT_ERROR_DELAY_MS,
  DEFAULT_REFRESH_RATE_MS,
  ErrorBackoff,
  computeRefreshDelay,
} from '../core/backoff.js';
import { TimerScheduler, type Scheduler } from '../core/scheduler.js';
import type { IdentityStore, IdentityStoreObserver } from '../identity/data-store.js';
import type { PolicyNotifier } from '../notifier/policy-notifier.js';
import {
  POLICY_FETCH_SUCCESS,
  type DeviceManagementResponse,
  type DeviceManagementStatus,
  type PolicyFetchRequest,
} from '../types/protocol.js';

export type ControllerState =
  | 'token_unavailable'
  | 'token_unmanaged'
  | 'token_error'
  | 'token_valid'
  | 'policy_valid'
  | 'policy_error'
  | 'policy_unavailable';

/** Domains whose users are never managed; no registration is attempted. */
export const DEFAULT_UNMANAGED_DOMAINS: readonly string[] = ['@googlemail.com', '@gmail.com'];

export interface PolicyControllerOptions {
  service: DeviceManagementService;
  /** Must outlive the controller. */
  cache: PolicyCache;
  tokenFetcher: DeviceTokenFetcher;
  dataStore: IdentityStore;
  notifier: PolicyNotifier;
  logger: Logger;
  scheduler?: Scheduler;
  refreshRateMs?: number;
  errorDelayMs?: number;
  unmanagedDomains?: readonly string[];
  clock?: () => number;
  /** Uniform in [0, 1); used to spread refreshes. */
  random?: () => number;
  generateId?: () => string;
}

export class PolicyController implements IdentityStoreObserver {
  private state: ControllerState = 'token_unavailable';
  private requestJob: RequestJob | null = null;
  private refreshRateMs: number;
  private disposed = false;

  private readonly service: DeviceManagementService;
  private readonly cache: PolicyCache;
  private readonly tokenFetcher: DeviceTokenFetcher;
  private readonly dataStore: IdentityStore;
  private readonly notifier: PolicyNotifier;
  private readonly logger: Logger;
  private readonly scheduler: Scheduler;
  private readonly backoff: ErrorBackoff;
  private readonly unmanagedDomains: readonly string[];
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly generateId: () => string;

  constructor(options: PolicyControllerOptions) {
    this.service = options.service;
    this.cache = options.cache;
    this.tokenFetcher = options.tokenFetcher;
    this.dataStore = options.dataStore;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.refreshRateMs = options.refreshRateMs ?? DEFAULT_REFRESH_RATE_MS;
    this.backoff = new ErrorBackoff({
      baseDelayMs: options.errorDelayMs ?? DEFAULT_ERROR_DELAY_MS,
      maxDelayMs: this.refreshRateMs,
    });
    this.unmanagedDomains = options.unmanagedDomains ?? DEFAULT_UNMANAGED_DOMAINS;
    this.now = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.generateId = options.generateId ?? randomUUID;

    this.dataStore.addObserver(this);
    this.setState(this.dataStore.deviceToken() ? 'token_valid' : 'token_unavailable');
  }

  getState(): ControllerState {
    return this.state;
  }

  getRefreshRate(): number {
    return this.refreshRateMs;
  }

  /** Delay the next error transition will use. */
  getErrorDelay(): number {
    return this.backoff.currentDelayMs;
  }

  setRefreshRate(refreshRateMs: number): void {
    this.refreshRateMs = refreshRateMs;
    this.backoff.setMaxDelay(refreshRateMs);
    if (this.state === 'policy_valid') {
      this.setState('policy_valid');
    }
  }

  /** Run the pending step now instead of waiting for its timer. */
  retry(): void {
    this.scheduler.cancelDelayedWork();
    this.doWork();
  }

  reset(): void {
    this.setState('token_unavailable');
  }

  /**
   * Fetch policy as soon as possible. Always ends in a transition that lets
   * the cache report an outcome, even when there is nothing to fetch with.
   */
  refreshPolicies(): void {
    if (!this.dataStore.deviceToken()) {
      this.setState(this.readyToFetchToken() ? 'token_unavailable' : 'token_unmanaged');
    } else {
      this.setState('token_valid');
    }
  }

  onDeviceTokenChanged(): void {
    this.setState(this.dataStore.deviceToken() ? 'token_valid' : 'token_unavailable');
  }

  onCredentialsChanged(): void {
    // With a token in hand the credentials already match it.
    if (this.dataStore.deviceToken()) return;

    this.notifier.inform('unenrolled', 'no_details', 'policy_controller');
    this.backoff.reset();
    this.setState('token_unavailable');
  }

  onPolicyFetchCompleted(status: DeviceManagementStatus, response: DeviceManagementResponse): void {
    if (status === 'success' && !response.policyResponse) {
      status = 'response_decoding_error';
    }

    switch (status) {
      case 'success': {
        const responses = response.policyResponse?.responses ?? [];
        const first = responses[0];
        if (!first) {
          this.logger.warn('Empty policy response from server', { policyType: this.dataStore.policyType() });
          this.setState('policy_unavailable');
          return;
        }
        if (responses.length > 1) {
          this.logger.warn('More than one policy in the server response, using the first', {
            count: responses.length,
          });
        }
        if (first.errorCode !== undefined && first.errorCode !== POLICY_FETCH_SUCCESS) {
          this.logger.warn('Server reported an error for the policy fetch', {
            errorCode: first.errorCode,
            errorMessage: first.errorMessage,
          });
          this.setState('policy_unavailable');
          return;
        }
        this.setState(this.cache.setPolicy(first) ? 'policy_valid' : 'policy_unavailable');
        return;
      }
      case 'device_not_found':
      case 'device_id_conflict':
      case 'management_token_invalid':
        this.logger.warn('Device token invalid or unknown to the server, re-registering', { status });
        this.setState('token_error');
        return;
      case 'invalid_serial_number':
        this.logger.info('Device is no longer enlisted for the domain');
        this.tokenFetcher.setSerialNumberInvalidState();
        this.setState('token_error');
        return;
      case 'management_not_supported':
        this.logger.info('Device is no longer managed');
        this.tokenFetcher.setUnmanagedState();
        this.setState('token_unmanaged');
        return;
      case 'missing_licenses':
        this.logger.info('Domain has no licenses left for this device');
        this.tokenFetcher.setMissingLicensesState();
        this.setState('token_unmanaged');
        return;
      case 'policy_not_found':
      case 'request_invalid':
      case 'activation_pending':
      case 'response_decoding_error':
      case 'http_status_error':
        this.logger.info('Policy server error, retrying at the regular refresh rate', { status });
        this.setState('policy_unavailable');
        return;
      case 'request_failed':
      case 'temporary_unavailable':
        this.logger.info('Temporary policy server error, backing off', { status });
        this.setState('policy_error');
        return;
      default: {
        const unreachable: never = status;
        this.logger.error('Unhandled device management status', { status: unreachable });
        this.setState('policy_error');
      }
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.dataStore.removeObserver(this);
    this.scheduler.cancelDelayedWork();
    this.cancelRequest();
  }

  private readyToFetchToken(): boolean {
    return (
      this.dataStore.tokenCacheLoaded() &&
      this.dataStore.userName().length > 0 &&
      this.dataStore.hasAuthToken()
    );
  }

  private canBeInManagedDomain(userName: string): boolean {
    if (!userName) return false;
    const lower = userName.toLowerCase();
    return !this.unmanagedDomains.some((domain) => lower.endsWith(domain.toLowerCase()));
  }

  private doWork(): void {
    switch (this.state) {
      case 'token_unavailable':
      case 'token_error':
        this.fetchToken();
        return;
      case 'token_valid':
      case 'policy_valid':
      case 'policy_error':
      case 'policy_unavailable':
        this.sendPolicyRequest();
        return;
      case 'token_unmanaged':
        return;
    }
  }

  private fetchToken(): void {
    if (!this.readyToFetchToken()) {
      this.logger.debug('Not ready to fetch a device token yet');
      return;
    }
    if (!this.canBeInManagedDomain(this.dataStore.userName())) {
      this.setState('token_unmanaged');
      return;
    }
    // Only kept if registration succeeds.
    this.dataStore.setDeviceId(this.generateId());
    this.tokenFetcher.fetchToken();
  }

  private sendPolicyRequest(): void {
    const dmToken = this.dataStore.deviceToken();
    if (!dmToken) {
      this.logger.warn('Device token disappeared before the policy request');
      this.setState('token_unavailable');
      return;
    }

    this.cancelRequest();
    const job = this.service.createJob('policy_fetch');
    job.dmToken = dmToken;
    job.clientId = this.dataStore.deviceId();
    job.userAffiliation = this.dataStore.userAffiliation();

    const fetchRequest: PolicyFetchRequest = {
      policyType: this.dataStore.policyType(),
      signatureType: 'sha1_rsa',
    };
    const machineId = this.dataStore.machineId();
    if (this.cache.machineIdMissing() && machineId) {
      fetchRequest.machineId = machineId;
    }
    const lastRefresh = this.cache.lastPolicyRefreshTime();
    if (!this.cache.isUnmanaged() && lastRefresh !== null) {
      fetchRequest.timestamp = lastRefresh;
    }
    const keyVersion = this.cache.getPublicKeyVersion();
    if (keyVersion !== undefined) {
      fetchRequest.publicKeyVersion = keyVersion;
    }
    job.request.policyRequest = { requests: [fetchRequest] };

    this.requestJob = job;
    this.logger.debug('Requesting policy', { policyType: fetchRequest.policyType });
    job.start((status, response) => {
      if (this.requestJob !== job) return;
      this.requestJob = null;
      this.onPolicyFetchCompleted(status, response);
    });
  }

  private cancelRequest(): void {
    if (this.requestJob) {
      this.requestJob.cancel();
      this.requestJob = null;
    }
  }

  private setState(newState: ControllerState): void {
    if (this.disposed) return;

    const previous = this.state;
    this.state = newState;
    this.cancelRequest();

    const now = this.now();
    const lastRefresh = this.cache.lastPolicyRefreshTime() ?? now;
    let refreshAt: number | null = null;

    switch (newState) {
      case 'token_unmanaged':
        this.notifier.inform('unmanaged', 'no_details', 'policy_controller');
        break;
      case 'token_unavailable':
      case 'token_valid':
        // The notifier hears about the outcome of the next step, not this one.
        refreshAt = now;
        break;
      case 'policy_valid':
        this.backoff.reset();
        refreshAt = lastRefresh + computeRefreshDelay(this.refreshRateMs, this.random);
        this.notifier.inform('success', 'no_details', 'policy_controller');
        break;
      case 'token_error':
        this.notifier.inform('network_error', 'bad_dmtoken', 'policy_controller');
        refreshAt = now + this.backoff.next();
        break;
      case 'policy_error':
        this.notifier.inform('network_error', 'policy_network_error', 'policy_controller');
        refreshAt = now + this.backoff.next();
        break;
      case 'policy_unavailable':
        refreshAt = now + this.backoff.saturate();
        this.notifier.inform('network_error', 'policy_network_error', 'policy_controller');
        break;
    }

    this.scheduler.cancelDelayedWork();
    if (refreshAt !== null) {
      this.scheduler.postDelayedWork(() => this.doWork(), Math.max(refreshAt - now, 0));
    }

    this.logger.debug('Policy controller state transition', {
      from: previous,
      to: newState,
      nextStepInMs: refreshAt === null ? null : Math.max(refreshAt - now, 0),
    });

    // A fetch attempt has an outcome; waiters on the cache may proceed.
    if (newState !== 'token_unavailable' && newState !== 'token_valid') {
      this.cache.setFetchingDone();
    }
  }
}
