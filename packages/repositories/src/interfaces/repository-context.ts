import type { RecordRepository } from './record-repository.js';
import type { VersionRepository } from './version-repository.js';

/**
 * RepositoryContext bundles the record store and the version ledger.
 *
 * This is the dependency injection point for the runtime: pass it to any
 * code that needs data access and swap implementations (Postgres,
 * in-memory) without changing the consuming code.
 */
export interface RepositoryContext {
  readonly records: RecordRepository;
  readonly versions: VersionRepository;
}

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export type TransactionOptions = {
  isolationLevel?: IsolationLevel;
};

/**
 * Work executed against transaction-scoped repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function are atomic.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T>;
}
