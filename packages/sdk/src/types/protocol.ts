/**
 * Shapes exchanged with the device management server and the status
 * vocabulary the transport reports back.
 *
 * @module types/protocol
 */

/**
 * Outcome of a request job, as reported by the transport layer.
 */
export type DeviceManagementStatus =
  | 'success'
  | 'request_failed'
  | 'temporary_unavailable'
  | 'http_status_error'
  | 'response_decoding_error'
  | 'management_not_supported'
  | 'request_invalid'
  | 'management_token_invalid'
  | 'activation_pending'
  | 'invalid_serial_number'
  | 'device_id_conflict'
  | 'missing_licenses'
  | 'device_not_found'
  | 'policy_not_found';

export type UserAffiliation = 'managed' | 'none';

export type JobType = 'register' | 'unregister' | 'policy_fetch';

/** Embedded error code meaning the fetch itself succeeded. */
export const POLICY_FETCH_SUCCESS = 200;

export interface PolicyFetchRequest {
  policyType: string;
  signatureType: 'none' | 'sha1_rsa';
  /** Only sent when the server reported it missing and one is known locally. */
  machineId?: string;
  /** Last refresh time the client knows of, in ms since epoch. */
  timestamp?: number;
  publicKeyVersion?: number;
}

export interface DeviceManagementRequest {
  policyRequest?: {
    requests: PolicyFetchRequest[];
  };
}

export interface PolicyFetchResponse {
  /** Serialized policy payload, opaque to everything but the decoder. */
  policyData?: string;
  policyDataSignature?: string;
  newPublicKey?: string;
  errorCode?: number;
  errorMessage?: string;
}

export interface DeviceManagementResponse {
  policyResponse?: {
    responses: PolicyFetchResponse[];
  };
}
