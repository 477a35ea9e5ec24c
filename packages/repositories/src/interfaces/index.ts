// Repository interfaces
// These define the persistence contract the version engine runs against.

export type {
  RecordRepository,
  InsertAllOptions,
  BatchInsertResult,
  BatchUpdateResult,
} from './record-repository.js';

export type {
  VersionRepository,
  AppendVersionInput,
  PatchVersionInput,
  VersionProjection,
  VersionProjectionSource,
  InsertVersionsResult,
  VersionFilter,
} from './version-repository.js';

export type {
  RepositoryContext,
  IsolationLevel,
  TransactionOptions,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
