// SQL fragments for record tables that are only known by name at run time

import { sql, type SQL } from 'drizzle-orm';
import type { AttributeMap, WhereClause, WhereValue } from '@trailkeep/protocol';
import { isWhereList } from '../where.js';

/**
 * Objects and arrays are sent as JSON text; Postgres casts them into the
 * json/jsonb column they are written to. Dates go as ISO 8601 text, since
 * drizzle's postgres.js driver passes timestamp parameters through as
 * strings.
 */
export function toParam(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return value;
}

function definedEntries(values: AttributeMap): Array<[string, unknown]> {
  return Object.entries(values).filter(([, value]) => value !== undefined);
}

function columnCondition(column: string, value: WhereValue): SQL {
  const identifier = sql.identifier(column);
  if (isWhereList(value)) {
    if (value.length === 0) return sql`false`;
    return sql`${identifier} in (${sql.join(
      value.map((item) => sql`${item}`),
      sql`, `
    )})`;
  }
  if (value === null) return sql`${identifier} is null`;
  return sql`${identifier} = ${value}`;
}

export function whereToSql(where: WhereClause): SQL {
  const entries = Object.entries(where);
  if (entries.length === 0) return sql`true`;
  return sql.join(
    entries.map(([column, value]) => columnCondition(column, value)),
    sql` and `
  );
}

export function assignmentsToSql(set: AttributeMap): SQL {
  return sql.join(
    definedEntries(set).map(([column, value]) => sql`${sql.identifier(column)} = ${toParam(value)}`),
    sql`, `
  );
}

export function insertRowsToSql(table: string, rows: AttributeMap[]): SQL {
  const columns = Array.from(new Set(rows.flatMap((row) => definedEntries(row).map(([c]) => c))));
  if (columns.length === 0) {
    return sql`insert into ${sql.identifier(table)} default values returning *`;
  }

  const tuples = rows.map(
    (row) =>
      sql`(${sql.join(
        columns.map((column) =>
          row[column] === undefined ? sql`default` : sql`${toParam(row[column])}`
        ),
        sql`, `
      )})`
  );

  return sql`insert into ${sql.identifier(table)} (${sql.join(
    columns.map((column) => sql.identifier(column)),
    sql`, `
  )}) values ${sql.join(tuples, sql`, `)} returning *`;
}
