import { sql, type SQL } from 'drizzle-orm';
import type { AttributeMap, RecordId, StoredRecord, WhereClause } from '@trailkeep/protocol';
import type { DatabaseExecutor } from '../db.js';
import type {
  RecordRepository,
  InsertAllOptions,
  BatchInsertResult,
  BatchUpdateResult,
} from '../../interfaces/index.js';
import { RecordNotFoundError } from '../../errors.js';
import { toPersistenceError } from '../errors.js';
import { rawRowToRecord, resultRows } from '../rows.js';
import { assignmentsToSql, insertRowsToSql, whereToSql } from '../sql.js';

/**
 * Record tables are named at run time, so queries are written as `sql`
 * templates with escaped identifiers instead of typed table objects.
 */
export class PgRecordRepository implements RecordRepository {
  constructor(private db: DatabaseExecutor) {}

  private async rows(table: string, query: SQL): Promise<Record<string, unknown>[]> {
    try {
      return resultRows(await this.db.execute(query));
    } catch (error) {
      throw toPersistenceError(error, table);
    }
  }

  async get(table: string, id: RecordId): Promise<StoredRecord | null> {
    const [row] = await this.rows(
      table,
      sql`select * from ${sql.identifier(table)} where ${sql.identifier('id')} = ${id}`
    );
    return row ? rawRowToRecord(row, table) : null;
  }

  async find(table: string, where: WhereClause = {}): Promise<StoredRecord[]> {
    const rows = await this.rows(
      table,
      sql`select * from ${sql.identifier(table)} where ${whereToSql(where)} order by ${sql.identifier('id')}`
    );
    return rows.map((r) => rawRowToRecord(r, table));
  }

  async count(table: string, where: WhereClause = {}): Promise<number> {
    const [row] = await this.rows(
      table,
      sql`select count(*)::int as count from ${sql.identifier(table)} where ${whereToSql(where)}`
    );
    return Number(row?.count ?? 0);
  }

  async insert(table: string, values: AttributeMap): Promise<StoredRecord> {
    const [row] = await this.rows(table, insertRowsToSql(table, [values]));
    if (!row) {
      throw toPersistenceError(new Error(`Insert into "${table}" returned no row`), table);
    }
    return rawRowToRecord(row, table);
  }

  async insertAll(
    table: string,
    rows: AttributeMap[],
    options: InsertAllOptions = {}
  ): Promise<BatchInsertResult> {
    if (rows.length === 0) {
      return { count: 0, rows: options.returning ? [] : null };
    }

    const inserted = await this.rows(table, insertRowsToSql(table, rows));
    return {
      count: inserted.length,
      rows: options.returning ? inserted.map((r) => rawRowToRecord(r, table)) : null,
    };
  }

  async update(table: string, id: RecordId, changes: AttributeMap): Promise<StoredRecord> {
    const { id: _ignored, ...assignable } = changes;
    if (Object.values(assignable).every((value) => value === undefined)) {
      const existing = await this.get(table, id);
      if (!existing) throw new RecordNotFoundError(table, id);
      return existing;
    }

    const [row] = await this.rows(
      table,
      sql`update ${sql.identifier(table)} set ${assignmentsToSql(assignable)} where ${sql.identifier('id')} = ${id} returning *`
    );
    if (!row) {
      throw new RecordNotFoundError(table, id);
    }
    return rawRowToRecord(row, table);
  }

  async updateAll(
    table: string,
    where: WhereClause,
    set: AttributeMap
  ): Promise<BatchUpdateResult> {
    if (Object.values(set).every((value) => value === undefined)) {
      return { count: await this.count(table, where) };
    }

    const rows = await this.rows(
      table,
      sql`update ${sql.identifier(table)} set ${assignmentsToSql(set)} where ${whereToSql(where)} returning ${sql.identifier('id')}`
    );
    return { count: rows.length };
  }

  async delete(table: string, id: RecordId): Promise<StoredRecord> {
    const [row] = await this.rows(
      table,
      sql`delete from ${sql.identifier(table)} where ${sql.identifier('id')} = ${id} returning *`
    );
    if (!row) {
      throw new RecordNotFoundError(table, id);
    }
    return rawRowToRecord(row, table);
  }

  async maxId(table: string): Promise<number> {
    const [row] = await this.rows(
      table,
      sql`select coalesce(max(${sql.identifier('id')}), 0) as max from ${sql.identifier(table)}`
    );
    return Number(row?.max ?? 0);
  }

  async reserveId(table: string): Promise<RecordId> {
    const [row] = await this.rows(
      table,
      sql`select nextval(pg_get_serial_sequence(${table}, 'id')) as id`
    );
    return Number(row?.id);
  }
}
