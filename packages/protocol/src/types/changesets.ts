// ChangeSet types - proposed mutations produced by the validation layer

import type { AttributeMap } from './common.js';
import type { Model } from './models.js';

/**
 * A field-level validation error
 */
export type FieldError = {
  field: string;
  message: string;
  code: string;
};

/**
 * A ChangeSet is a proposed mutation of one record.
 *
 * `changes` only ever contains attributes whose value differs from `data`.
 * An empty `changes` on an existing record is a no-op.
 */
export type ChangeSet = {
  model: Model;

  /**
   * Base state. Carries `id` when the record already exists.
   */
  data: AttributeMap;

  changes: AttributeMap;

  valid: boolean;
  errors: FieldError[];
};
