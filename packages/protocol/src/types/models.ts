// Model types - how a tracked record type is described

import type { AnyZodObject } from 'zod';

/**
 * A Model describes one kind of tracked record.
 *
 * Example: `{ name: 'SimpleCompany', table: 'simple_companies', schema, softDelete: false, timestamps: true }`
 */
export type Model = {
  /**
   * Logical type name, written to `item_type` on every version
   */
  name: string;

  /**
   * Storage table the records live in
   */
  table: string;

  /**
   * Attribute schema used to validate changesets
   */
  schema: AnyZodObject;

  /**
   * Whether records carry a `deleted_at` column
   */
  softDelete: boolean;

  /**
   * Whether records carry `inserted_at` / `updated_at`, set on write
   */
  timestamps: boolean;
};

/**
 * Attributes added to every record of a model tracked in strict mode.
 */
export const LINKAGE_ATTRIBUTES = ['first_version_id', 'current_version_id'] as const;

export type LinkageAttribute = (typeof LINKAGE_ATTRIBUTES)[number];
