// Versioned single-record operations
//
// Each plan persists the record under the model key and the version that
// records the mutation under the version key, in that order.

import type { ChangeSet, Model, StoredRecord } from '@trailkeep/protocol';
import { hasChanges } from '@trailkeep/protocol';
import { RecordNotFoundError, type RepositoryContext } from '@trailkeep/repositories';
import { captureVersion } from '../capture/capture.js';
import { UnsupportedOperationError } from '../errors.js';
import { Multi, changesetRecordId } from '../multi/multi.js';
import type { PlanOptions, VersionedData, VersionedUpdateData } from './types.js';
import { insertValues, updateValues } from './values.js';

/**
 * Internal step holding a soft-deleted record as it was before
 */
export const PREVIOUS_RECORD_STEP = 'previousRecord';

export function planInsert<M extends string, V extends string>(
  cs: ChangeSet,
  options: PlanOptions<M, V>
): Multi<VersionedData<M, V>, VersionedData<M, V>> {
  const { modelKey, versionKey, attribution, now } = options;

  return Multi.new()
    .run(modelKey, (repos) => repos.records.insert(cs.model.table, insertValues(cs, now)), {
      changeset: cs,
    })
    .run(versionKey, (repos, results) =>
      repos.versions.insert(
        captureVersion({ event: 'insert', model: cs.model, record: results[modelKey] }, attribution)
      )
    );
}

export function planUpdate<M extends string, V extends string>(
  cs: ChangeSet,
  options: PlanOptions<M, V>
): Multi<VersionedUpdateData<M, V>, VersionedUpdateData<M, V>> {
  const { modelKey, versionKey, attribution, now } = options;

  return Multi.new()
    .run(
      modelKey,
      async (repos): Promise<StoredRecord> => {
        const id = changesetRecordId(cs);
        if (!hasChanges(cs)) return { ...cs.data, id };
        return repos.records.update(cs.model.table, id, updateValues(cs, now));
      },
      { changeset: cs }
    )
    .run(versionKey, async (repos, results) => {
      if (!hasChanges(cs)) return null;
      return repos.versions.insert(
        captureVersion(
          { event: 'update', model: cs.model, itemId: results[modelKey].id, changes: cs.changes },
          attribution
        )
      );
    });
}

export function planDelete<M extends string, V extends string>(
  cs: ChangeSet,
  options: PlanOptions<M, V>
): Multi<VersionedData<M, V>, VersionedData<M, V>> {
  const { modelKey, versionKey, attribution } = options;

  return Multi.new()
    .run(modelKey, (repos) => repos.records.delete(cs.model.table, changesetRecordId(cs)), {
      changeset: cs,
    })
    .run(versionKey, (repos, results) =>
      repos.versions.insert(
        captureVersion({ event: 'delete', model: cs.model, record: results[modelKey] }, attribution)
      )
    );
}

/**
 * @throws UnsupportedOperationError if the model does not soft delete
 */
export function requireSoftDelete(model: Model, operation: string): void {
  if (!model.softDelete) {
    throw new UnsupportedOperationError(operation, `${model.name} does not soft delete`);
  }
}

/**
 * The persisted record a changeset was built from
 */
export async function loadRecord(repos: RepositoryContext, cs: ChangeSet): Promise<StoredRecord> {
  const id = changesetRecordId(cs);
  const record = await repos.records.get(cs.model.table, id);
  if (!record) throw new RecordNotFoundError(cs.model.table, id);
  return record;
}

/**
 * Set `deleted_at` and record a `soft_delete` version holding the record
 * as it was before.
 *
 * @throws UnsupportedOperationError if the model does not soft delete
 */
export function planSoftDelete<M extends string, V extends string>(
  cs: ChangeSet,
  options: PlanOptions<M, V>
): Multi<VersionedData<M, V>, VersionedData<M, V>> {
  const { modelKey, versionKey, attribution, now } = options;
  const { model } = cs;
  requireSoftDelete(model, 'softDelete');

  return Multi.new()
    .runInternal(PREVIOUS_RECORD_STEP, (repos) => loadRecord(repos, cs), { reportAs: modelKey })
    .run(
      modelKey,
      (repos, results) =>
        repos.records.update(model.table, results[PREVIOUS_RECORD_STEP].id, {
          ...updateValues(cs, now),
          deleted_at: now,
        }),
      { changeset: cs }
    )
    .run(versionKey, (repos, results) =>
      repos.versions.insert(
        captureVersion(
          { event: 'soft_delete', model, record: results[PREVIOUS_RECORD_STEP] },
          attribution
        )
      )
    );
}
