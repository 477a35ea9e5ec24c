import type { DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
} from '../../interfaces/index.js';
import { PgRecordRepository } from './record-repository.js';
import { PgVersionRepository } from './version-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const companies = await repos.records.find('companies', { city: 'Greenwich' });
 * ```
 */
export function createPgRepositoryContext(db: DatabaseExecutor): RepositoryContext {
  return {
    records: new PgRecordRepository(db),
    versions: new PgVersionRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(
 *   async (tx) => {
 *     const company = await tx.records.insert('companies', { name: 'Acme LLC' });
 *     await tx.versions.insert({ ... });
 *   },
 *   { isolationLevel: 'serializable' }
 * );
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: DatabaseExecutor
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly records: PgRecordRepository;
  readonly versions: PgVersionRepository;

  constructor(private db: DatabaseExecutor) {
    this.records = new PgRecordRepository(db);
    this.versions = new PgVersionRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * The callback receives repositories bound to the transaction. Drizzle
   * commits when it resolves and rolls back and rethrows when it throws.
   */
  async transaction<T>(fn: TransactionFn<T>, options: TransactionOptions = {}): Promise<T> {
    const run = (tx: DatabaseExecutor) => fn(createPgRepositoryContext(tx));

    if (options.isolationLevel) {
      return this.db.transaction(run, { isolationLevel: options.isolationLevel });
    }
    return this.db.transaction(run);
  }
}
