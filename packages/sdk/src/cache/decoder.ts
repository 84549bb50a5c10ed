/**
 * Turning a fetch response into policy.
 *
 * The cache only knows the {@link PolicyDecoder} contract. The default
 * decoder reads a JSON payload from `policyData`:
 *
 * ```json
 * {
 *   "timestamp": 1700000000000,
 *   "publicKeyVersion": 3,
 *   "policies": {
 *     "HomepageLocation": { "level": "mandatory", "scope": "user", "value": "https://intranet.example" }
 *   }
 * }
 * ```
 *
 * @module cache/decoder
 */

import { z } from 'zod';
import { PolicyDecodeError } from '../core/errors.js';
import { PolicyMap, type PolicyEntry, type PublicKeyVersion } from '../types/policy.js';
import type { PolicyFetchResponse } from '../types/protocol.js';

export interface DecodedPolicy {
  policies: PolicyMap;
  /** Time the server generated the policy, ms since epoch. */
  timestamp: number;
  publicKeyVersion: PublicKeyVersion;
  /** Server asks the client to send its machine id with the next request. */
  machineIdMissing: boolean;
}

export type DecodeResult =
  | { ok: true; value: DecodedPolicy }
  | { ok: false; error: PolicyDecodeError };

export type PolicyDecoder = (response: PolicyFetchResponse) => DecodeResult;

const policyEntrySchema = z.object({
  level: z.enum(['mandatory', 'recommended']),
  scope: z.enum(['machine', 'user']),
  value: z.unknown(),
});

const policyPayloadSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  publicKeyVersion: z.number().int().nonnegative().optional(),
  machineIdMissing: z.boolean().optional(),
  policies: z.record(policyEntrySchema),
});

export type PolicyPayload = z.infer<typeof policyPayloadSchema>;

function fail(message: string): DecodeResult {
  return { ok: false, error: new PolicyDecodeError(message) };
}

export function decodeJsonPolicyResponse(response: PolicyFetchResponse): DecodeResult {
  if (response.policyData === undefined || response.policyData.length === 0) {
    return fail('Response carries no policy data');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(response.policyData);
  } catch (error) {
    return fail(`Policy data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = policyPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    return fail(`Malformed policy payload${where}: ${first?.message ?? 'unknown issue'}`);
  }

  const payload = parsed.data;
  const entries = Object.entries(payload.policies).map(
    ([name, entry]): [string, PolicyEntry] => [
      name,
      { level: entry.level, scope: entry.scope, value: entry.value },
    ]
  );

  return {
    ok: true,
    value: {
      policies: new PolicyMap(entries),
      timestamp: payload.timestamp,
      publicKeyVersion:
        payload.publicKeyVersion === undefined
          ? { version: 0, valid: false }
          : { version: payload.publicKeyVersion, valid: true },
      machineIdMissing: payload.machineIdMissing ?? false,
    },
  };
}

/**
 * Build the `policyData` string the default decoder accepts. Used by servers
 * written against this engine and by tests.
 */
export function encodeJsonPolicyPayload(payload: PolicyPayload): string {
  return JSON.stringify(payload);
}
