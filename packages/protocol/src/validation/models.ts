// Model definition

import type { AnyZodObject } from 'zod';
import type { Model } from '../types/models.js';

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

export type DefineModelInput = {
  name: string;
  table: string;
  schema: AnyZodObject;
  softDelete?: boolean;
  timestamps?: boolean;
};

/**
 * Describe a tracked record type.
 *
 * @example
 * ```ts
 * const Company = defineModel({
 *   name: 'SimpleCompany',
 *   table: 'simple_companies',
 *   schema: z.object({ name: z.string(), city: z.string().nullable().optional() }),
 * });
 * ```
 */
export function defineModel(input: DefineModelInput): Model {
  if (input.name.trim() === '') {
    throw new TypeError('Model name must not be empty');
  }
  if (!TABLE_NAME_PATTERN.test(input.table)) {
    throw new TypeError(
      `Invalid table name "${input.table}": use lowercase letters, digits and underscores`
    );
  }

  return {
    name: input.name,
    table: input.table,
    schema: input.schema,
    softDelete: input.softDelete ?? false,
    timestamps: input.timestamps ?? false,
  };
}
