import type {
  AttributeMap,
  RecordId,
  StoredRecord,
  WhereClause,
} from '@trailkeep/protocol';

/**
 * Options for batch inserts
 */
export type InsertAllOptions = {
  /**
   * Return the inserted rows (default: only the count)
   */
  returning?: boolean;
};

/**
 * Outcome of a batch insert
 */
export type BatchInsertResult = {
  count: number;
  rows: StoredRecord[] | null;
};

/**
 * Outcome of a predicate-based batch update
 */
export type BatchUpdateResult = {
  count: number;
};

/**
 * Repository interface for tracked records.
 *
 * Records are plain attribute maps living in named tables and identified by a
 * sequence-assigned numeric `id`. The repository knows nothing about versions;
 * the runtime composes record and version operations inside one transaction.
 */
export interface RecordRepository {
  /**
   * Get a record by id
   */
  get(table: string, id: RecordId): Promise<StoredRecord | null>;

  /**
   * Find records matching a filter, ordered by id
   */
  find(table: string, where?: WhereClause): Promise<StoredRecord[]>;

  count(table: string, where?: WhereClause): Promise<number>;

  /**
   * Insert one record. An explicit `id` in `values` is used as-is.
   */
  insert(table: string, values: AttributeMap): Promise<StoredRecord>;

  insertAll(
    table: string,
    rows: AttributeMap[],
    options?: InsertAllOptions
  ): Promise<BatchInsertResult>;

  /**
   * Update one record.
   * @throws RecordNotFoundError if no record has this id
   */
  update(table: string, id: RecordId, changes: AttributeMap): Promise<StoredRecord>;

  updateAll(table: string, where: WhereClause, set: AttributeMap): Promise<BatchUpdateResult>;

  /**
   * Delete one record and return it as it was.
   * @throws RecordNotFoundError if no record has this id
   */
  delete(table: string, id: RecordId): Promise<StoredRecord>;

  /**
   * Highest id currently in the table (0 when empty)
   */
  maxId(table: string): Promise<number>;

  /**
   * Take the next value from the table's id sequence.
   * The reserved id is never handed out again, even if unused.
   */
  reserveId(table: string): Promise<RecordId>;
}
