/**
 * Request jobs against the device management server.
 *
 * A job is created per request, configured, then started with a callback.
 * Completion is always delivered asynchronously; a cancelled job never calls
 * back.
 *
 * @module cloud/service
 */

import type {
  DeviceManagementRequest,
  DeviceManagementResponse,
  DeviceManagementStatus,
  JobType,
  UserAffiliation,
} from '../types/protocol.js';

export type JobCallback = (status: DeviceManagementStatus, response: DeviceManagementResponse) => void;

export interface RequestJob {
  readonly type: JobType;
  dmToken: string;
  clientId: string;
  userAffiliation: UserAffiliation;
  readonly request: DeviceManagementRequest;
  start(callback: JobCallback): void;
  cancel(): void;
}

export interface DeviceManagementService {
  createJob(type: JobType): RequestJob;
}

/**
 * Registration side of the protocol, driven by the controller but
 * implemented elsewhere.
 */
export interface DeviceTokenFetcher {
  /** Start a registration; the result lands in the identity store. */
  fetchToken(): void;
  setUnmanagedState(): void;
  setSerialNumberInvalidState(): void;
  setMissingLicensesState(): void;
}
