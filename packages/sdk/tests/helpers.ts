import { vi } from 'vitest';
import type { Logger } from '../src/utils/logger.js';
import type { Scheduler } from '../src/core/scheduler.js';
import type {
  DeviceManagementService,
  DeviceTokenFetcher,
  JobCallback,
  RequestJob,
} from '../src/cloud/service.js';
import type {
  DeviceManagementRequest,
  DeviceManagementResponse,
  DeviceManagementStatus,
  JobType,
  PolicyFetchResponse,
  UserAffiliation,
} from '../src/types/protocol.js';
import { encodeJsonPolicyPayload, type PolicyPayload } from '../src/cache/decoder.js';

export const mockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/**
 * Scheduler that only runs work when told to.
 */
export class ManualScheduler implements Scheduler {
  private pending: { callback: () => void; delayMs: number } | null = null;
  readonly posted: number[] = [];

  postDelayedWork(callback: () => void, delayMs: number): void {
    this.pending = { callback, delayMs };
    this.posted.push(delayMs);
  }

  cancelDelayedWork(): void {
    this.pending = null;
  }

  hasPendingWork(): boolean {
    return this.pending !== null;
  }

  pendingDelay(): number | null {
    return this.pending?.delayMs ?? null;
  }

  /** Run the pending callback, if any. Returns whether something ran. */
  runPending(): boolean {
    const work = this.pending;
    if (!work) return false;
    this.pending = null;
    work.callback();
    return true;
  }
}

export class FakeJob implements RequestJob {
  dmToken = '';
  clientId = '';
  userAffiliation: UserAffiliation = 'none';
  readonly request: DeviceManagementRequest = {};
  cancelled = false;
  started = false;
  private callback: JobCallback | null = null;

  constructor(readonly type: JobType) {}

  start(callback: JobCallback): void {
    this.started = true;
    this.callback = callback;
  }

  cancel(): void {
    this.cancelled = true;
  }

  complete(status: DeviceManagementStatus, response: DeviceManagementResponse = {}): void {
    if (!this.callback) {
      throw new Error('Job was never started');
    }
    if (this.cancelled) return;
    this.callback(status, response);
  }
}

export class FakeDeviceManagementService implements DeviceManagementService {
  readonly jobs: FakeJob[] = [];

  createJob(type: JobType): FakeJob {
    const job = new FakeJob(type);
    this.jobs.push(job);
    return job;
  }

  lastJob(): FakeJob {
    const job = this.jobs[this.jobs.length - 1];
    if (!job) {
      throw new Error('No job was created');
    }
    return job;
  }
}

export const mockTokenFetcher = () => ({
  fetchToken: vi.fn(),
  setUnmanagedState: vi.fn(),
  setSerialNumberInvalidState: vi.fn(),
  setMissingLicensesState: vi.fn(),
}) satisfies DeviceTokenFetcher;

export const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);

export function fetchResponse(payload: Partial<PolicyPayload> = {}): PolicyFetchResponse {
  return {
    policyData: encodeJsonPolicyPayload({
      timestamp: payload.timestamp ?? NOW - 1000,
      policies: payload.policies ?? {
        DisableSpdy: { level: 'mandatory', scope: 'user', value: true },
      },
      ...(payload.publicKeyVersion !== undefined ? { publicKeyVersion: payload.publicKeyVersion } : {}),
      ...(payload.machineIdMissing !== undefined ? { machineIdMissing: payload.machineIdMissing } : {}),
    }),
  };
}

export function successResponse(...responses: PolicyFetchResponse[]): DeviceManagementResponse {
  return { policyResponse: { responses } };
}
