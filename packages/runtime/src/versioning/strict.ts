// Strict mode: versions linked to the records they describe
//
// The record must reference its version and the version must describe the
// record, so both ids are needed before either row exists. Three steps in
// one transaction:
//
// 1. initialVersion (internal): reserve the ids and write a placeholder
//    version carrying them
// 2. model: write the record pointing at the placeholder
// 3. version: patch the placeholder with what was actually persisted
//
// A failure of the placeholder step is reported under the version key.

import type { ChangeSet, RecordId, StoredRecord, Version } from '@trailkeep/protocol';
import { hasChanges } from '@trailkeep/protocol';
import type { RepositoryContext } from '@trailkeep/repositories';
import { captureVersion, serializeRecord } from '../capture/capture.js';
import { Multi, changesetRecordId } from '../multi/multi.js';
import { PREVIOUS_RECORD_STEP, loadRecord, requireSoftDelete } from './operations.js';
import type {
  IdStrategy,
  StrictPlanOptions,
  VersionedData,
  VersionedUpdateData,
} from './types.js';
import { insertValues, updateValues } from './values.js';

export const INITIAL_VERSION_STEP = 'initialVersion';

type ReservedIds = {
  versionId: RecordId;
  recordId: RecordId;
};

/**
 * `sequence` takes ids from the engine's sequences and writes rows with
 * them. `max` predicts `max(id) + 1`, which only holds when no other
 * writer commits in between; the trail runs it at serializable isolation.
 */
async function reserveVersionId(repos: RepositoryContext, strategy: IdStrategy): Promise<RecordId> {
  return strategy === 'sequence' ? repos.versions.reserveId() : (await repos.versions.maxId()) + 1;
}

async function reserveIds(
  repos: RepositoryContext,
  table: string,
  strategy: IdStrategy
): Promise<ReservedIds> {
  const versionId = await reserveVersionId(repos, strategy);
  const recordId =
    strategy === 'sequence' ? await repos.records.reserveId(table) : (await repos.records.maxId(table)) + 1;
  return { versionId, recordId };
}

/**
 * Explicit id for a row, only when it was taken from a sequence
 */
function reservedId(strategy: IdStrategy, id: RecordId): { id?: RecordId } {
  return strategy === 'sequence' ? { id } : {};
}

export function planStrictInsert<M extends string, V extends string>(
  cs: ChangeSet,
  options: StrictPlanOptions<M, V>
): Multi<VersionedData<M, V>, VersionedData<M, V>> {
  const { modelKey, versionKey, attribution, now, idStrategy } = options;
  const { model } = cs;

  return Multi.new()
    .runInternal(
      INITIAL_VERSION_STEP,
      async (repos): Promise<Version> => {
        const ids = await reserveIds(repos, model.table, idStrategy);
        const placeholder = captureVersion(
          {
            event: 'insert',
            model,
            record: {
              ...insertValues(cs, now),
              id: ids.recordId,
              first_version_id: ids.versionId,
              current_version_id: ids.versionId,
            },
          },
          attribution
        );
        return repos.versions.insert({ ...placeholder, ...reservedId(idStrategy, ids.versionId) });
      },
      { reportAs: versionKey }
    )
    .run(
      modelKey,
      (repos, results) => {
        const version = results[INITIAL_VERSION_STEP];
        return repos.records.insert(model.table, {
          ...insertValues(cs, now),
          ...reservedId(idStrategy, version.itemId),
          first_version_id: version.id,
          current_version_id: version.id,
        });
      },
      { changeset: cs }
    )
    .run(versionKey, (repos, results) => {
      const record: StoredRecord = results[modelKey];
      return repos.versions.patch(results[INITIAL_VERSION_STEP].id, {
        itemId: record.id,
        itemChanges: serializeRecord(record),
      });
    });
}

/**
 * Strict update. Without changes nothing is written and the version result
 * is null.
 */
export function planStrictUpdate<M extends string, V extends string>(
  cs: ChangeSet,
  options: StrictPlanOptions<M, V>
): Multi<VersionedUpdateData<M, V>, VersionedUpdateData<M, V>> {
  const { modelKey, versionKey, attribution, now, idStrategy } = options;
  const { model } = cs;

  return Multi.new()
    .runInternal(
      INITIAL_VERSION_STEP,
      async (repos): Promise<Version | null> => {
        if (!hasChanges(cs)) return null;

        const versionId = await reserveVersionId(repos, idStrategy);
        const placeholder = captureVersion(
          {
            event: 'update',
            model,
            itemId: changesetRecordId(cs),
            changes: { ...cs.changes, current_version_id: versionId },
          },
          attribution
        );
        return repos.versions.insert({ ...placeholder, ...reservedId(idStrategy, versionId) });
      },
      { reportAs: versionKey }
    )
    .run(
      modelKey,
      async (repos, results): Promise<StoredRecord> => {
        const id = changesetRecordId(cs);
        const version = results[INITIAL_VERSION_STEP];
        if (!version) return { ...cs.data, id };
        return repos.records.update(model.table, id, {
          ...updateValues(cs, now),
          current_version_id: version.id,
        });
      },
      { changeset: cs }
    )
    .run(versionKey, async (repos, results) => {
      const version = results[INITIAL_VERSION_STEP];
      if (!version) return null;
      return repos.versions.patch(version.id, {
        itemChanges: serializeRecord({ ...cs.changes, current_version_id: version.id }),
      });
    });
}

/**
 * Strict soft delete. The `soft_delete` version becomes the record's current
 * version and ends up holding the record as persisted, `deleted_at` included.
 *
 * @throws UnsupportedOperationError if the model does not soft delete
 */
export function planStrictSoftDelete<M extends string, V extends string>(
  cs: ChangeSet,
  options: StrictPlanOptions<M, V>
): Multi<VersionedData<M, V>, VersionedData<M, V>> {
  const { modelKey, versionKey, attribution, now, idStrategy } = options;
  const { model } = cs;
  requireSoftDelete(model, 'softDelete');

  return Multi.new()
    .runInternal(PREVIOUS_RECORD_STEP, (repos) => loadRecord(repos, cs), { reportAs: modelKey })
    .runInternal(
      INITIAL_VERSION_STEP,
      async (repos, results): Promise<Version> => {
        const versionId = await reserveVersionId(repos, idStrategy);
        const placeholder = captureVersion(
          {
            event: 'soft_delete',
            model,
            record: { ...results[PREVIOUS_RECORD_STEP], current_version_id: versionId },
          },
          attribution
        );
        return repos.versions.insert({ ...placeholder, ...reservedId(idStrategy, versionId) });
      },
      { reportAs: versionKey }
    )
    .run(
      modelKey,
      (repos, results) =>
        repos.records.update(model.table, results[PREVIOUS_RECORD_STEP].id, {
          ...updateValues(cs, now),
          deleted_at: now,
          current_version_id: results[INITIAL_VERSION_STEP].id,
        }),
      { changeset: cs }
    )
    .run(versionKey, (repos, results) => {
      const record: StoredRecord = results[modelKey];
      return repos.versions.patch(results[INITIAL_VERSION_STEP].id, {
        itemChanges: serializeRecord(record),
      });
    });
}
