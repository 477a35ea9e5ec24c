// ChangeSet construction
//
// The validation layer sitting in front of the version engine. It casts
// params against a model's zod schema and keeps only the attributes whose
// value actually changes.

import type { AnyZodObject } from 'zod';
import type { AttributeMap } from '../types/common.js';
import type { ChangeSet, FieldError } from '../types/changesets.js';
import type { Model } from '../types/models.js';
import { isDeepEqual } from './equality.js';

/**
 * Build a ChangeSet for `model` from base `data` and proposed `params`.
 *
 * Records without an `id` are validated against the full schema; existing
 * records only have their params validated. Params that are not part of the
 * schema are ignored.
 */
export function changeset(
  model: Model,
  data: AttributeMap = {},
  params: AttributeMap = {}
): ChangeSet {
  const isNew = data.id === undefined || data.id === null;
  const shape = model.schema.shape;
  const permitted = Object.keys(params).filter((key) => key in shape);

  const candidate: AttributeMap = {};
  for (const key of permitted) {
    candidate[key] = params[key];
  }

  const schema: AnyZodObject = isNew ? model.schema : model.schema.partial();
  const parsed = schema.safeParse(candidate);

  const changes: AttributeMap = {};
  const errors: FieldError[] = [];

  if (parsed.success) {
    const values: AttributeMap = parsed.data;
    for (const key of permitted) {
      const value = key in values ? values[key] : candidate[key];
      if (!isDeepEqual(value, data[key])) {
        changes[key] = value;
      }
    }
  } else {
    for (const key of permitted) {
      if (!isDeepEqual(candidate[key], data[key])) {
        changes[key] = candidate[key];
      }
    }
    for (const issue of parsed.error.issues) {
      errors.push({
        field: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      });
    }
  }

  return { model, data, changes, valid: errors.length === 0, errors };
}

/**
 * Put changes onto a changeset without validation.
 *
 * Values equal to the base data are not recorded as changes.
 */
export function change(cs: ChangeSet, attributes: AttributeMap): ChangeSet {
  const changes: AttributeMap = { ...cs.changes };
  for (const [key, value] of Object.entries(attributes)) {
    if (isDeepEqual(value, cs.data[key])) {
      delete changes[key];
    } else {
      changes[key] = value;
    }
  }
  return { ...cs, changes };
}

/**
 * Remove attributes from a changeset's changes.
 */
export function dropChanges(cs: ChangeSet, keys: readonly string[]): ChangeSet {
  const changes: AttributeMap = { ...cs.changes };
  for (const key of keys) {
    delete changes[key];
  }
  return { ...cs, changes };
}

/**
 * The record a changeset would produce.
 */
export function applyChanges(cs: ChangeSet): AttributeMap {
  return { ...cs.data, ...cs.changes };
}

export function hasChanges(cs: ChangeSet): boolean {
  return Object.keys(cs.changes).length > 0;
}

export function isChangeSet(value: unknown): value is ChangeSet {
  if (!value || typeof value !== 'object') return false;
  return (
    'model' in value &&
    'data' in value &&
    'changes' in value &&
    'valid' in value &&
    'errors' in value
  );
}
