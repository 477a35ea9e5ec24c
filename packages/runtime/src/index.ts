// @trailkeep/runtime
// Transactional version composition for tracked records

// Trail (versioned operations over a repository context)
export {
  Trail,
  createTrail,
  type TrailConfig,
  type OperationOptions,
  type BulkOperationOptions,
} from './trail.js';

// Configuration
export {
  resolveTrailOptions,
  loadTrailSettingsFromEnv,
  trailSettingsSchema,
  type TrailSettings,
  type TrailSettingsInput,
  type EnvironmentSettings,
} from './config.js';

// Error types
export {
  TrailError,
  ConfigurationError,
  InvalidChangesetError,
  DuplicateStepError,
  UnknownStepError,
  UnsupportedOperationError,
  BrokenVersionChainError,
  StepFailedError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  withLogContext,
  silentLogger,
  createCapturingLogger,
  type TrailLogger,
  type LogLevel,
  type LogData,
  type LogEntry,
  type ConsoleLoggerOptions,
} from './logger.js';

// Change capture
export { captureVersion, captureProjection, serializeRecord, type CaptureSource } from './capture/index.js';

// Step composition
export {
  Multi,
  transact,
  changesetRecordId,
  type StepMap,
  type StepFn,
  type MergeFn,
  type StepKind,
  type RunOptions,
  type Step,
  type StepDescriptor,
  type TransactOptions,
} from './multi/index.js';

// Result shaping
export {
  stripLinkage,
  unwrapResult,
  type TransactSuccess,
  type TransactFailure,
  type TransactResult,
  type Returned,
} from './result/index.js';

// Versioned operation plans
export {
  planInsert,
  planUpdate,
  planDelete,
  planSoftDelete,
  planStrictInsert,
  planStrictUpdate,
  planStrictSoftDelete,
  planInsertAll,
  planUpdateAll,
  planSoftDeleteAll,
  INITIAL_VERSION_STEP,
  type IdStrategy,
  type PlanOptions,
  type StrictPlanOptions,
  type BulkPlanOptions,
  type VersionedData,
  type VersionedUpdateData,
  type BulkVersionKey,
  type BulkInsertData,
  type BulkUpdateData,
} from './versioning/index.js';

// History
export {
  getVersions,
  getVersion,
  walkVersionChain,
  applyVersion,
  replayVersions,
  type ReplayVersionsOptions,
  type ReplayVersionsResult,
} from './history/index.js';
