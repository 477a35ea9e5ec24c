// Persistence error types

import type { RecordId } from '@trailkeep/protocol';

/**
 * Base class for errors raised by a persistence engine.
 */
export class PersistenceError extends Error {
  readonly code: string;

  constructor(message: string, code = 'PERSISTENCE_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.code = code;
  }
}

export type ConstraintKind = 'not_null' | 'foreign_key' | 'unique' | 'check';

/**
 * A write was rejected by a storage constraint.
 */
export class ConstraintViolationError extends PersistenceError {
  readonly constraint: ConstraintKind;
  readonly table: string;
  readonly column?: string;

  constructor(
    message: string,
    options: { constraint: ConstraintKind; table: string; column?: string; cause?: unknown }
  ) {
    super(message, 'CONSTRAINT_VIOLATION', { cause: options.cause });
    this.name = 'ConstraintViolationError';
    this.constraint = options.constraint;
    this.table = options.table;
    this.column = options.column;
  }
}

/**
 * The row an update or delete targeted does not exist.
 */
export class RecordNotFoundError extends PersistenceError {
  readonly table: string;
  readonly id: RecordId;

  constructor(table: string, id: RecordId) {
    super(`Record not found: ${table}#${id}`, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
    this.table = table;
    this.id = id;
  }
}
