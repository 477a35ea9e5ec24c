// Version history queries

import type { Model, RecordId, StoredRecord, Version } from '@trailkeep/protocol';
import type { RepositoryContext } from '@trailkeep/repositories';
import { BrokenVersionChainError } from '../errors.js';

/**
 * All versions of one record, oldest first.
 */
export function getVersions(repos: RepositoryContext, model: Model, id: RecordId): Promise<Version[]> {
  return repos.versions.list({ itemType: model.name, itemId: id });
}

/**
 * The latest version of one record, or null if it has none.
 */
export async function getVersion(
  repos: RepositoryContext,
  model: Model,
  id: RecordId
): Promise<Version | null> {
  const versions = await getVersions(repos, model, id);
  return versions.at(-1) ?? null;
}

function linkageId(record: StoredRecord, attribute: string): RecordId | null {
  const value = record[attribute];
  return typeof value === 'number' ? value : null;
}

/**
 * Versions of a strict-mode record from `first_version_id` to
 * `current_version_id`, each checked to point at itself.
 *
 * @throws BrokenVersionChainError if the linkage is missing or a version
 * in between does not match
 */
export async function walkVersionChain(
  repos: RepositoryContext,
  model: Model,
  record: StoredRecord
): Promise<Version[]> {
  const broken = (reason: string) => new BrokenVersionChainError(model.name, record.id, reason);

  const firstId = linkageId(record, 'first_version_id');
  const currentId = linkageId(record, 'current_version_id');
  if (firstId === null || currentId === null) {
    throw broken('record carries no version linkage');
  }

  const versions = await getVersions(repos, model, record.id);
  const start = versions.findIndex((v) => v.id === firstId);
  const end = versions.findIndex((v) => v.id === currentId);
  if (start === -1) throw broken(`first version ${firstId} not found`);
  if (end === -1) throw broken(`current version ${currentId} not found`);
  if (end < start) throw broken(`current version ${currentId} precedes first version ${firstId}`);

  const chain = versions.slice(start, end + 1);
  const [first] = chain;
  if (first?.event !== 'insert' || first.itemChanges.first_version_id !== firstId) {
    throw broken(`version ${firstId} is not the record's insert version`);
  }

  for (const version of chain) {
    if (version.itemChanges.current_version_id !== version.id) {
      throw broken(`version ${version.id} does not reference itself`);
    }
  }

  return chain;
}
