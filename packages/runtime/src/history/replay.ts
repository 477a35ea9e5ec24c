// Version replay
//
// Rebuilds a record's attributes at any point of its history by applying
// its versions in order.

import type { AttributeMap, RecordId, Version } from '@trailkeep/protocol';

export type ReplayVersionsOptions = {
  /**
   * Stop after this version (default: replay everything)
   */
  untilVersionId?: RecordId;
};

export type ReplayVersionsResult = {
  /**
   * Attributes after the last applied version; null when the record does
   * not exist at that point
   */
  state: AttributeMap | null;

  versionsReplayed: number;
};

/**
 * Apply one version to a record's state.
 *
 * - insert: the snapshot becomes the state
 * - update: changes are merged in
 * - soft_delete: `deleted_at` is set, from the version when it carries one
 * - delete: the record no longer exists
 */
export function applyVersion(state: AttributeMap | null, version: Version): AttributeMap | null {
  switch (version.event) {
    case 'insert':
      return { ...version.itemChanges };

    case 'update':
      return { ...(state ?? {}), ...version.itemChanges };

    case 'soft_delete': {
      const deletedAt = version.itemChanges.deleted_at ?? version.insertedAt;
      return { ...(state ?? {}), ...version.itemChanges, deleted_at: deletedAt };
    }

    case 'delete':
      return null;
  }
}

/**
 * Replay versions (ordered by id) to reconstruct a record.
 *
 * @example
 * ```ts
 * const versions = await getVersions(repos, Company, 7);
 * const { state } = replayVersions(versions, { untilVersionId: versions[1].id });
 * ```
 */
export function replayVersions(
  versions: Version[],
  options: ReplayVersionsOptions = {}
): ReplayVersionsResult {
  let state: AttributeMap | null = null;
  let versionsReplayed = 0;

  for (const version of versions) {
    if (options.untilVersionId !== undefined && version.id > options.untilVersionId) break;
    state = applyVersion(state, version);
    versionsReplayed++;
  }

  return { state, versionsReplayed };
}
