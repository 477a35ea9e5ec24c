// Version types - the immutable change ledger

import type { AttributeMap, RecordId, Timestamp } from './common.js';

/**
 * The kind of mutation a version records.
 */
export type VersionEvent = 'insert' | 'update' | 'delete' | 'soft_delete';

export const VERSION_EVENTS: readonly VersionEvent[] = [
  'insert',
  'update',
  'delete',
  'soft_delete',
];

/**
 * A Version is an immutable record of one mutation to one tracked record.
 *
 * `itemChanges` holds a full snapshot for insert, delete and soft_delete
 * events, and only the changed attributes for update events.
 */
export type Version = {
  id: RecordId;
  event: VersionEvent;

  /**
   * Logical type name of the tracked record, e.g. "SimpleCompany"
   */
  itemType: string;

  /**
   * Identifier of the tracked record at the time of the event
   */
  itemId: RecordId;

  itemChanges: AttributeMap;

  /**
   * Who made the change, if known
   */
  originatorId: RecordId | null;

  /**
   * Free-text source tag, e.g. "admin" or "scraper"
   */
  origin: string | null;

  meta: AttributeMap | null;

  insertedAt: Timestamp;
};

/**
 * Everything a version carries before the ledger assigns its id and timestamp.
 */
export type VersionPayload = Omit<Version, 'id' | 'insertedAt'>;

/**
 * Attribution copied verbatim onto every version an operation writes.
 */
export type VersionAttribution = {
  originatorId?: RecordId | null;
  origin?: string | null;
  meta?: AttributeMap | null;
};
