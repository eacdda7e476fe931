/**
 * @gitvista/core
 *
 * Asynchronous query engine for an interactive git client: background jobs
 * per view kind, a generation-stamped result cache, debounced invalidation
 * driven by a repository watcher, and a git CLI backend.
 *
 * @packageDocumentation
 */

// Engine
export { QueryEngine, type QueryEngineOptions, type SlotState } from './engine.js'
export { JobWorker, type JobWorkerOptions, type JobOutcome } from './worker.js'

// Job kinds, parameters and results
export {
  JobKindSchema,
  JobSpecSchema,
  DiffParamsSchema,
  BlameParamsSchema,
  LogParamsSchema,
  FetchParamsSchema,
  PushParamsSchema,
  JOB_KINDS,
  PROGRESS_KINDS,
  NETWORK_KINDS,
  REFRESHABLE_KINDS,
  fingerprintOf,
  createJobRequest,
  type JobKind,
  type JobSpec,
  type JobSpecInput,
  type JobParams,
  type JobRequest,
  type JobPayload,
  type JobPayloadMap,
  type JobResult,
} from './job-kind.js'

// Cache, generations and notifications
export { ResultCache, type CacheEntry, type CacheEntryOf } from './result-cache.js'
export { GenerationCounter, type GenerationBump, type GenerationBumpReason } from './generation.js'
export { NotificationChannel, type NotificationEvent } from './notification-channel.js'

// Cancellation, locking and timing
export { CancelFlag, throwIfAborted, type CancelReason } from './cancellation.js'
export { Semaphore, ExclusiveLock, type Release } from './mutex.js'
export { systemClock, type Clock, type TimerHandle } from './clock.js'
export { ProgressThrottle } from './progress.js'

// Change detection
export { DebouncedInvalidator, type DebouncedInvalidatorOptions, type InvalidatorState } from './invalidator.js'
export {
  RepositoryWatcher,
  DEFAULT_IGNORE,
  type RepositoryWatcherOptions,
  type SubscribeFn,
  type WatchEvent,
  type WatchEventType,
} from './repo-watcher.js'

// Errors
export { JobError, GitCommandError, isSurfacedError, isAbortError, toJobError, type ErrorKind } from './errors.js'

// Configuration
export {
  ConfigManager,
  EngineConfigSchema,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  readEnvOverrides,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js'

// Git backend
export { GitCliBackend, mutationArgs, type GitCliBackendOptions } from './backend/git-cli-backend.js'
export { createSpawnRunner, type GitRunner, type GitRunOptions, type GitCommandResult } from './backend/git-runner.js'
export type * from './backend/types.js'
