/**
 * Cloud policy synchronization engine.
 *
 * @module policy-sync
 */

export { PolicyMap, type PolicyEntry, type PolicyLevel, type PolicyScope, type PublicKeyVersion } from './types/policy.js';
export {
  POLICY_FETCH_SUCCESS,
  type DeviceManagementRequest,
  type DeviceManagementResponse,
  type DeviceManagementStatus,
  type JobType,
  type PolicyFetchRequest,
  type PolicyFetchResponse,
  type UserAffiliation,
} from './types/protocol.js';

export { createLogger, silentLogger, isLogLevel, type Logger, type LogLevel, type LogContext } from './utils/logger.js';
export { ConfigError, DeviceManagementError, PolicyDecodeError } from './core/errors.js';
export {
  ErrorBackoff,
  computeRefreshDelay,
  DEFAULT_ERROR_DELAY_MS,
  DEFAULT_REFRESH_RATE_MS,
  type BackoffConfig,
} from './core/backoff.js';
export { TimerScheduler, LoggingScheduler, type Scheduler } from './core/scheduler.js';

export {
  PolicyDataStore,
  USER_POLICY_TYPE,
  DEVICE_POLICY_TYPE,
  type IdentityStore,
  type IdentityStoreObserver,
} from './identity/data-store.js';
export {
  PolicyNotifier,
  type ErrorDetails,
  type NotifierSource,
  type PolicyNotifierObserver,
  type SubsystemState,
} from './notifier/policy-notifier.js';

export { PolicyCache, type PolicyCacheObserver, type PolicyCacheOptions } from './cache/policy-cache.js';
export {
  decodeJsonPolicyResponse,
  encodeJsonPolicyPayload,
  type DecodedPolicy,
  type DecodeResult,
  type PolicyDecoder,
  type PolicyPayload,
} from './cache/decoder.js';
export {
  FilePolicyCacheStore,
  MemoryPolicyCacheStore,
  type PersistedPolicy,
  type PolicyCacheStore,
} from './cache/backing-store.js';

export type { DeviceManagementService, DeviceTokenFetcher, JobCallback, RequestJob } from './cloud/service.js';
export { HttpDeviceManagementService, mapHttpStatus, type HttpServiceConfig } from './cloud/http-service.js';

export {
  PolicyController,
  DEFAULT_UNMANAGED_DOMAINS,
  type ControllerState,
  type PolicyControllerOptions,
} from './controller/policy-controller.js';
export {
  MultiSourcePolicyProvider,
  type MultiSourcePolicyProviderOptions,
  type PolicyProviderObserver,
} from './provider/multi-source-provider.js';

export { PolicySubsystem, type PolicySubsystemOptions } from './subsystem/policy-subsystem.js';
export {
  PolicyConnector,
  createPolicyConnector,
  type ConnectorDependencies,
} from './subsystem/connector.js';

export {
  clampRefreshRate,
  resolveSyncConfig,
  syncConfigSchema,
  MIN_REFRESH_RATE_MS,
  MAX_REFRESH_RATE_MS,
  type ResolvedSyncConfig,
  type SourceConfig,
  type SyncConfig,
} from './config/schema.js';
export { findSyncConfig, loadSyncConfig, parseSyncConfig, ENV_LOG_LEVEL, ENV_SERVER_URL } from './config/loader.js';
