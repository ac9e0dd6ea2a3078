/**
 * @study-helper/offline-sync
 *
 * Offline mutation queue and server reconciliation for the study-helper
 * client. Writes that cannot reach the server are persisted, replayed in
 * order when connectivity returns, and reconciled against the server with
 * last-write-wins on the server's clock.
 *
 * @packageDocumentation
 * @module @study-helper/offline-sync
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  JsonValue,
  MutationPayload,
  MutationMethod,
  MutationRecord,
  ApplyRequest,
  ApplyResponse,
  ConflictVerdict,
  ServerChange,
  ChangeFeedPage,
  DispatchOptions,
  RemoteApplyEndpoint,
  ConflictEntry,
  PermanentFailure,
  ReconciliationOutcome,
} from './types.js'

// ============================================================================
// Client
// ============================================================================

export { SyncClient, createHttpSyncClient } from './sync-client.js'
export type { SyncClientOptions, HttpSyncClientOptions, SubmitResult, WriteOptions } from './sync-client.js'

// ============================================================================
// Components
// ============================================================================

export { DurableQueue, QUEUE_FORMAT_VERSION } from './queue/durable-queue.js'
export type { DurableQueueOptions, PersistedQueue } from './queue/durable-queue.js'

export { ReplayEngine, INITIAL_CHECKPOINT, withTimeout } from './replay/replay-engine.js'
export type {
  ReplayEngineOptions,
  ReplayProgress,
  RecordResult,
  OutcomeListener,
} from './replay/replay-engine.js'

export { ConnectivityMonitor } from './connectivity/connectivity-monitor.js'
export type { ConnectivityMonitorOptions, Drainable, DrainTrigger } from './connectivity/connectivity-monitor.js'

export { createManualReachability, createProbeReachability } from './connectivity/reachability.js'
export type {
  NetworkStatus,
  NetworkStatusChange,
  NetworkStatusListener,
  ReachabilitySource,
  ManualReachability,
  ProbeReachability,
  ProbeReachabilityOptions,
} from './connectivity/reachability.js'

export { createConflictResolver, isServerNewer, CONFLICT_REASON } from './conflict/conflict-resolver.js'
export type {
  ConflictResolver,
  ConflictCheck,
  ConflictDecision,
  ConflictResolverOptions,
} from './conflict/conflict-resolver.js'

export { ResolvingEndpoint } from './conflict/resolving-endpoint.js'
export type { ResolvingEndpointOptions, StoredResource } from './conflict/resolving-endpoint.js'

export { HttpTransport } from './transport/http-transport.js'
export type { HttpTransportOptions, FetchFn } from './transport/http-transport.js'

// ============================================================================
// Mutations & Storage
// ============================================================================

export {
  createMutationRecord,
  generateMutationId,
  describeRecord,
  mutationRecordSchema,
} from './mutation/mutation-record.js'
export type { MutationInput, CreateRecordOptions } from './mutation/mutation-record.js'

export { validateMutationInput, validateBaseUpdatedAt, matchResource } from './mutation/resource-payloads.js'
export type { ResourceName, ResourceMatch } from './mutation/resource-payloads.js'

export { MemoryStorage, readItem, writeItem, removeItem } from './storage/storage-adapter.js'
export type { KeyValueStorage, StorageResult } from './storage/storage-adapter.js'

export { FileStorage } from './storage/file-storage.js'
export type { FileStorageOptions } from './storage/file-storage.js'

// ============================================================================
// Configuration, Errors & Logging
// ============================================================================

export {
  resolveSyncConfig,
  loadSyncConfigFromEnv,
  syncConfigSchema,
  DEFAULT_MAX_RETRIES,
  DEFAULT_STORAGE_KEY,
} from './config.js'
export type { SyncConfig, SyncConfigInput } from './config.js'

export {
  SyncError,
  TransientDispatchError,
  NetworkError,
  RequestTimeoutError,
  ServerUnavailableError,
  RejectedDispatchError,
  InvalidResponseError,
  StorageCorruptionError,
  StorageReadError,
  StorageWriteError,
  PayloadValidationError,
  ConfigError,
  isTransientError,
  toError,
} from './errors.js'
export type { SyncErrorCode } from './errors.js'

export { createLogger } from './logger.js'
export type { Logger, LogLevel, LogSink, DebugOption } from './logger.js'
