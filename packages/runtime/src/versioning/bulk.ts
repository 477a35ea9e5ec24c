// Versioned bulk operations

import type { AttributeMap, Model, Version, WhereClause } from '@trailkeep/protocol';
import { captureProjection, captureVersion } from '../capture/capture.js';
import { UnsupportedOperationError } from '../errors.js';
import { Multi } from '../multi/multi.js';
import type {
  BulkInsertData,
  BulkPlanOptions,
  BulkUpdateData,
  BulkVersionKey,
} from './types.js';

/**
 * Internal step holding every inserted row, whether or not the caller
 * asked for them
 */
export const INSERTED_ROWS_STEP = 'insertedRows';

function rejectStrict(operation: string, strictMode: boolean): void {
  if (strictMode) {
    throw new UnsupportedOperationError(operation, 'strict mode links single records only');
  }
}

/**
 * Insert all rows in one statement, then one insert version per row under
 * `${versionKey}:${id}`.
 *
 * @throws UnsupportedOperationError in strict mode
 */
export function planInsertAll<M extends string, V extends string>(
  model: Model,
  entries: AttributeMap[],
  options: BulkPlanOptions<M, V>
): Multi<BulkInsertData<M, V>, BulkInsertData<M, V>> {
  const { modelKey, versionKey, attribution, now, returning, strictMode } = options;
  rejectStrict('insertAll', strictMode);

  const rows = model.timestamps
    ? entries.map((entry) => ({ inserted_at: now, updated_at: now, ...entry }))
    : entries;

  return Multi.new()
    .runInternal(
      INSERTED_ROWS_STEP,
      (repos) => repos.records.insertAll(model.table, rows, { returning: true }),
      { reportAs: modelKey }
    )
    .run(modelKey, (_repos, results) => ({
      count: results[INSERTED_ROWS_STEP].count,
      rows: returning ? results[INSERTED_ROWS_STEP].rows : null,
    }))
    .merge<Record<BulkVersionKey<V>, Version>>(
      (_repos, results) => {
        let versions = Multi.new();
        for (const row of results[INSERTED_ROWS_STEP].rows ?? []) {
          const key: BulkVersionKey<V> = `${versionKey}:${row.id}`;
          versions = versions.run(key, (repos) =>
            repos.versions.insert(captureVersion({ event: 'insert', model, record: row }, attribution))
          );
        }
        return versions;
      },
      { reportAs: versionKey }
    );
}

/**
 * Project every matching row into an update version, then update them all.
 *
 * @throws UnsupportedOperationError in strict mode
 */
export function planUpdateAll<M extends string, V extends string>(
  model: Model,
  where: WhereClause,
  set: AttributeMap,
  options: BulkPlanOptions<M, V>
): Multi<BulkUpdateData<M, V>, BulkUpdateData<M, V>> {
  const { modelKey, versionKey, attribution, now, returning, strictMode } = options;
  rejectStrict('updateAll', strictMode);

  return Multi.new()
    .run(versionKey, (repos) =>
      repos.versions.insertFromQuery(
        { table: model.table, where },
        captureProjection('update', model, set, attribution),
        { returning }
      )
    )
    .run(modelKey, (repos) =>
      repos.records.updateAll(
        model.table,
        where,
        model.timestamps ? { ...set, updated_at: now } : set
      )
    );
}

/**
 * Soft delete every matching row. Each version carries the `deleted_at`
 * that was set.
 *
 * @throws UnsupportedOperationError in strict mode or for models that do
 * not soft delete
 */
export function planSoftDeleteAll<M extends string, V extends string>(
  model: Model,
  where: WhereClause,
  options: BulkPlanOptions<M, V>
): Multi<BulkUpdateData<M, V>, BulkUpdateData<M, V>> {
  const { modelKey, versionKey, attribution, now, returning, strictMode } = options;
  rejectStrict('softDeleteAll', strictMode);
  if (!model.softDelete) {
    throw new UnsupportedOperationError('softDeleteAll', `${model.name} does not soft delete`);
  }

  const set = { deleted_at: now };

  return Multi.new()
    .run(versionKey, (repos) =>
      repos.versions.insertFromQuery(
        { table: model.table, where },
        captureProjection('soft_delete', model, set, attribution),
        { returning }
      )
    )
    .run(modelKey, (repos) =>
      repos.records.updateAll(
        model.table,
        where,
        model.timestamps ? { ...set, updated_at: now } : set
      )
    );
}
