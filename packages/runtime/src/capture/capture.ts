// Change capture
//
// Turns a mutation into the payload of the version that records it.
// Insert and removal events keep a full snapshot; updates keep only the
// attributes that changed.

import type {
  AttributeMap,
  Model,
  RecordId,
  StoredRecord,
  VersionAttribution,
  VersionPayload,
} from '@trailkeep/protocol';
import type { VersionProjection } from '@trailkeep/repositories';

export type CaptureSource =
  | { event: 'insert'; model: Model; record: StoredRecord }
  | { event: 'update'; model: Model; itemId: RecordId; changes: AttributeMap }
  | { event: 'delete' | 'soft_delete'; model: Model; record: StoredRecord };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => serializeValue(item) ?? null);
  if (isPlainObject(value)) return serializeRecord(value);
  return value;
}

/**
 * JSON-safe copy of a record: dates become ISO strings and undefined
 * attributes are dropped.
 */
export function serializeRecord(record: AttributeMap): AttributeMap {
  const serialized: AttributeMap = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    serialized[key] = serializeValue(value);
  }
  return serialized;
}

/**
 * Build the version payload for one mutation.
 */
export function captureVersion(
  source: CaptureSource,
  attribution: VersionAttribution = {}
): VersionPayload {
  const attributed = {
    itemType: source.model.name,
    originatorId: attribution.originatorId ?? null,
    origin: attribution.origin ?? null,
    meta: attribution.meta ?? null,
  };

  switch (source.event) {
    case 'insert':
    case 'delete':
    case 'soft_delete':
      return {
        ...attributed,
        event: source.event,
        itemId: source.record.id,
        itemChanges: serializeRecord(source.record),
      };

    case 'update':
      return {
        ...attributed,
        event: 'update',
        itemId: source.itemId,
        itemChanges: serializeRecord(source.changes),
      };
  }
}

/**
 * Version template shared by every row a bulk operation touches. Each row
 * contributes its own id when the projection is written.
 */
export function captureProjection(
  event: 'update' | 'soft_delete',
  model: Model,
  changes: AttributeMap,
  attribution: VersionAttribution = {}
): VersionProjection {
  return {
    event,
    itemType: model.name,
    itemChanges: serializeRecord(changes),
    originatorId: attribution.originatorId ?? null,
    origin: attribution.origin ?? null,
    meta: attribution.meta ?? null,
  };
}
