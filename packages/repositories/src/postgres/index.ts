// Postgres engine: drizzle-orm over postgres.js
export { createDatabase, type Database, type DatabaseConfig, type DatabaseExecutor } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
export { toPersistenceError } from './errors.js';
