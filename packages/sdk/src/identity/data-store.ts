/**
 * Identity material for one policy domain: the device management token,
 * the signed-in user and the machine the client runs on.
 *
 * @module identity/data-store
 */

import type { UserAffiliation } from '../types/protocol.js';

export interface IdentityStoreObserver {
  /** The device token was set or cleared. */
  onDeviceTokenChanged(): void;
  /** User name or auth token changed. */
  onCredentialsChanged(): void;
}

/**
 * What a policy controller reads from, and writes the client id to.
 */
export interface IdentityStore {
  deviceToken(): string;
  deviceId(): string;
  setDeviceId(deviceId: string): void;
  userName(): string;
  hasAuthToken(): boolean;
  tokenCacheLoaded(): boolean;
  userAffiliation(): UserAffiliation;
  machineId(): string;
  machineModel(): string;
  policyType(): string;
  addObserver(observer: IdentityStoreObserver): void;
  removeObserver(observer: IdentityStoreObserver): void;
}

export const USER_POLICY_TYPE = 'policy-sync/user';
export const DEVICE_POLICY_TYPE = 'policy-sync/device';

export class PolicyDataStore implements IdentityStore {
  private token = '';
  private clientId = '';
  private user = '';
  private authToken = '';
  private cacheLoaded = false;
  private affiliation: UserAffiliation = 'none';
  private machine = { id: '', model: '' };
  private readonly observers = new Set<IdentityStoreObserver>();

  constructor(private readonly type: string) {}

  static createForUserPolicies(): PolicyDataStore {
    return new PolicyDataStore(USER_POLICY_TYPE);
  }

  static createForDevicePolicies(): PolicyDataStore {
    return new PolicyDataStore(DEVICE_POLICY_TYPE);
  }

  deviceToken(): string {
    return this.token;
  }

  deviceId(): string {
    return this.clientId;
  }

  userName(): string {
    return this.user;
  }

  hasAuthToken(): boolean {
    return this.authToken.length > 0;
  }

  tokenCacheLoaded(): boolean {
    return this.cacheLoaded;
  }

  userAffiliation(): UserAffiliation {
    return this.affiliation;
  }

  machineId(): string {
    return this.machine.id;
  }

  machineModel(): string {
    return this.machine.model;
  }

  policyType(): string {
    return this.type;
  }

  setDeviceId(deviceId: string): void {
    this.clientId = deviceId;
  }

  setUserAffiliation(affiliation: UserAffiliation): void {
    this.affiliation = affiliation;
  }

  setMachineInfo(machineId: string, machineModel: string): void {
    this.machine = { id: machineId, model: machineModel };
  }

  setTokenCacheLoaded(): void {
    this.cacheLoaded = true;
  }

  /**
   * Store a device token (and the client id it was issued for) and tell
   * observers. An empty token means the client is no longer registered.
   */
  setDeviceToken(deviceToken: string, deviceId?: string): void {
    this.token = deviceToken;
    if (deviceId !== undefined) {
      this.clientId = deviceId;
    }
    this.notify((observer) => observer.onDeviceTokenChanged());
  }

  setCredentials(userName: string, authToken: string): void {
    this.user = userName;
    this.authToken = authToken;
    this.notify((observer) => observer.onCredentialsChanged());
  }

  addObserver(observer: IdentityStoreObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: IdentityStoreObserver): void {
    this.observers.delete(observer);
  }

  private notify(fn: (observer: IdentityStoreObserver) => void): void {
    for (const observer of [...this.observers]) {
      fn(observer);
    }
  }
}
