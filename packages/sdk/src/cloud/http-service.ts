/**
 * fetch-based transport for the device management protocol.
 *
 * Requests are POSTed as JSON to the server URL with the request kind and
 * client id in the query string; HTTP status codes are mapped onto
 * {@link DeviceManagementStatus} values the controller understands.
 *
 * @module cloud/http-service
 */

import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { DeviceManagementError, toError } from '../core/errors.js';
import type {
  DeviceManagementRequest,
  DeviceManagementResponse,
  DeviceManagementStatus,
  JobType,
  UserAffiliation,
} from '../types/protocol.js';
import type { DeviceManagementService, JobCallback, RequestJob } from './service.js';

export interface HttpServiceConfig {
  serverUrl: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Value of the `apptype` query parameter */
  appType?: string;
}

export interface HttpServiceOptions {
  config: HttpServiceConfig;
  logger: Logger;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEVICE_TYPE = '2';

const REQUEST_PARAM: Record<JobType, string> = {
  register: 'register',
  unregister: 'unregister',
  policy_fetch: 'policy',
};

const responseSchema = z.object({
  policyResponse: z
    .object({
      responses: z.array(
        z.object({
          policyData: z.string().optional(),
          policyDataSignature: z.string().optional(),
          newPublicKey: z.string().optional(),
          errorCode: z.number().optional(),
          errorMessage: z.string().optional(),
        })
      ),
    })
    .optional(),
});

/**
 * Map an HTTP status from the server onto a protocol status. 902 is never
 * sent as a real HTTP code but kept for servers that do.
 */
export function mapHttpStatus(code: number): DeviceManagementStatus {
  switch (code) {
    case 200:
      return 'success';
    case 400:
      return 'request_invalid';
    case 401:
      return 'management_token_invalid';
    case 403:
      return 'management_not_supported';
    case 404:
    case 500:
    case 503:
      return 'temporary_unavailable';
    case 491:
      return 'activation_pending';
    case 901:
      return 'device_not_found';
    case 902:
      return 'policy_not_found';
    default:
      return code >= 500 && code <= 599 ? 'temporary_unavailable' : 'http_status_error';
  }
}

export class HttpDeviceManagementService implements DeviceManagementService {
  private readonly serverUrl: string;
  private readonly timeout: number;
  private readonly appType: string;
  private readonly logger: Logger;

  constructor(options: HttpServiceOptions) {
    this.serverUrl = options.config.serverUrl.replace(/\/$/, '');
    this.timeout = options.config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.appType = options.config.appType ?? 'Node';
    this.logger = options.logger;
  }

  createJob(type: JobType): RequestJob {
    return new HttpRequestJob(type, this, this.logger);
  }

  buildUrl(job: RequestJob): string {
    const params = new URLSearchParams({
      request: REQUEST_PARAM[job.type],
      devicetype: DEVICE_TYPE,
      apptype: this.appType,
      deviceid: job.clientId,
      useraffiliation: job.userAffiliation,
    });
    return `${this.serverUrl}?${params.toString()}`;
  }

  async execute(
    job: RequestJob,
    controller: AbortController
  ): Promise<{ status: DeviceManagementStatus; response: DeviceManagementResponse }> {
    const url = this.buildUrl(job);
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    this.logger.debug('Sending device management request', { type: job.type, url });

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.buildHeaders(job),
        body: JSON.stringify(job.request),
        signal: controller.signal,
      });

      const status = mapHttpStatus(response.status);
      if (status !== 'success') {
        this.logger.warn('Device management server returned an error', {
          type: job.type,
          httpStatus: response.status,
          status,
        });
        return { status, response: {} };
      }

      return { status, response: this.parseResponse(await response.text()) };
    } catch (error) {
      if (error instanceof DeviceManagementError) {
        this.logger.warn('Malformed response from device management server', {
          type: job.type,
          error: error.message,
        });
        return { status: 'response_decoding_error', response: {} };
      }

      const lastError = toError(error);
      if (controller.signal.aborted && !timedOut) {
        this.logger.debug('Device management request cancelled', { type: job.type });
        return { status: 'request_failed', response: {} };
      }
      this.logger.warn('Device management request failed', {
        type: job.type,
        error: timedOut ? `Request timed out after ${this.timeout}ms` : lastError.message,
      });
      return { status: 'request_failed', response: {} };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(job: RequestJob): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (job.dmToken) {
      headers['Authorization'] = `DMToken token=${job.dmToken}`;
    }
    return headers;
  }

  private parseResponse(body: string): DeviceManagementResponse {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new DeviceManagementError('Response body is not JSON', 200, body);
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DeviceManagementError(
        `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        200,
        body
      );
    }
    return parsed.data;
  }
}

class HttpRequestJob implements RequestJob {
  dmToken = '';
  clientId = '';
  userAffiliation: UserAffiliation = 'none';
  readonly request: DeviceManagementRequest = {};

  private readonly abort = new AbortController();
  private cancelled = false;

  constructor(
    readonly type: JobType,
    private readonly service: HttpDeviceManagementService,
    private readonly logger: Logger
  ) {}

  start(callback: JobCallback): void {
    this.service
      .execute(this, this.abort)
      .then(({ status, response }) => {
        if (!this.cancelled) {
          callback(status, response);
        }
      })
      .catch((error: unknown) => {
        this.logger.error('Request job callback failed', { type: this.type }, toError(error));
      });
  }

  cancel(): void {
    this.cancelled = true;
    this.abort.abort();
  }
}
