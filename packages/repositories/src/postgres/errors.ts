import postgres from 'postgres';
import {
  ConstraintViolationError,
  PersistenceError,
  type ConstraintKind,
} from '../errors.js';

/**
 * SQLSTATE class 23 codes mapped to constraint kinds
 */
const CONSTRAINT_CODES: Partial<Record<string, ConstraintKind>> = {
  '23502': 'not_null',
  '23503': 'foreign_key',
  '23505': 'unique',
  '23514': 'check',
};

function findPostgresError(error: unknown): postgres.PostgresError | null {
  if (error instanceof postgres.PostgresError) return error;
  if (error instanceof Error && error.cause !== undefined) return findPostgresError(error.cause);
  return null;
}

/**
 * Wrap whatever the driver threw in a PersistenceError.
 */
export function toPersistenceError(error: unknown, table: string): PersistenceError {
  if (error instanceof PersistenceError) return error;

  const pgError = findPostgresError(error);
  if (pgError) {
    const constraint = CONSTRAINT_CODES[pgError.code];
    if (constraint) {
      return new ConstraintViolationError(pgError.message, {
        constraint,
        table: pgError.table_name ?? table,
        column: pgError.column_name,
        cause: error,
      });
    }
    return new PersistenceError(pgError.message, pgError.code, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(message, 'PERSISTENCE_ERROR', { cause: error });
}
