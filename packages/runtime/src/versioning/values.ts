// Attribute maps written for a changeset

import type { AttributeMap, ChangeSet } from '@trailkeep/protocol';
import { applyChanges } from '@trailkeep/protocol';

/**
 * Values of a new record: base data plus changes, plus timestamps when the
 * model keeps them. A missing id is left to the engine.
 */
export function insertValues(cs: ChangeSet, now: Date): AttributeMap {
  const { id, ...values } = applyChanges(cs);
  const withId = id === undefined || id === null ? values : { ...values, id };
  return cs.model.timestamps ? { ...withId, inserted_at: now, updated_at: now } : withId;
}

export function updateValues(cs: ChangeSet, now: Date): AttributeMap {
  return cs.model.timestamps ? { ...cs.changes, updated_at: now } : { ...cs.changes };
}
