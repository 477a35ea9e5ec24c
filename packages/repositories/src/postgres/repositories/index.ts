// Postgres repository implementations
export { PgRecordRepository } from './record-repository.js';
export { PgVersionRepository } from './version-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
