// Row mapping between Postgres and protocol shapes

import { z } from 'zod';
import type { StoredRecord, Version } from '@trailkeep/protocol';
import { VERSION_EVENTS } from '@trailkeep/protocol';
import { PersistenceError } from '../errors.js';
import type { versions } from './schema/index.js';

type VersionRow = typeof versions.$inferSelect;

/**
 * Shape of a versions row as raw SQL returns it (snake_case columns,
 * bigint and timestamp values possibly as strings).
 */
const rawVersionRowSchema = z.object({
  id: z.coerce.number().int(),
  event: z.enum(['insert', 'update', 'delete', 'soft_delete']),
  item_type: z.string(),
  item_id: z.coerce.number().int(),
  item_changes: z.record(z.unknown()),
  originator_id: z.coerce.number().int().nullable(),
  origin: z.string().nullable(),
  meta: z.record(z.unknown()).nullable(),
  inserted_at: z.coerce.date(),
});

/**
 * Drivers hand raw query results back either as an array of rows
 * (postgres.js) or wrapped in `{ rows }` (node-postgres, pg-proxy).
 */
const rawResultSchema = z.union([
  z.array(z.record(z.unknown())),
  z.object({ rows: z.array(z.record(z.unknown())) }),
]);

export function resultRows(result: unknown): Record<string, unknown>[] {
  const parsed = rawResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new PersistenceError('Query returned no rows array', 'INVALID_RESULT');
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.rows;
}

export function rowToVersion(row: VersionRow): Version {
  if (!VERSION_EVENTS.includes(row.event)) {
    throw new PersistenceError(`Unknown version event "${row.event}"`, 'INVALID_ROW');
  }
  return {
    id: row.id,
    event: row.event,
    itemType: row.itemType,
    itemId: row.itemId,
    itemChanges: row.itemChanges,
    originatorId: row.originatorId,
    origin: row.origin,
    meta: row.meta,
    insertedAt: row.insertedAt.toISOString(),
  };
}

export function rawRowToVersion(row: Record<string, unknown>): Version {
  const parsed = rawVersionRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError(
      `Malformed versions row: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`,
      'INVALID_ROW'
    );
  }
  const r = parsed.data;
  return {
    id: r.id,
    event: r.event,
    itemType: r.item_type,
    itemId: r.item_id,
    itemChanges: r.item_changes,
    originatorId: r.originator_id,
    origin: r.origin,
    meta: r.meta,
    insertedAt: r.inserted_at.toISOString(),
  };
}

export function rawRowToRecord(row: Record<string, unknown>, table: string): StoredRecord {
  const id = Number(row.id);
  if (!Number.isSafeInteger(id)) {
    throw new PersistenceError(`Row in "${table}" has no numeric id`, 'INVALID_ROW');
  }
  return { ...row, id };
}
