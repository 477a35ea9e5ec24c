// @trailkeep/repositories
// Persistence contract for tracked records and the version ledger.
//
// The runtime only ever talks to these interfaces. Two engines fulfil them:
// an in-memory one (tests, prototypes) and Postgres via drizzle-orm.
//
// Key concepts:
// - RecordRepository works on tables named at run time
// - VersionRepository is the append-only ledger
// - TransactionalRepositoryContext scopes both to one transaction

export * from './interfaces/index.js';
export {
  PersistenceError,
  ConstraintViolationError,
  RecordNotFoundError,
  type ConstraintKind,
} from './errors.js';
export { matchesWhere } from './where.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type InMemoryTableOptions,
  type InMemoryRepositoryOptions,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
