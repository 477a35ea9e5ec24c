// Shared types for versioned operation plans

import type { StoredRecord, Version, VersionAttribution } from '@trailkeep/protocol';
import type {
  BatchInsertResult,
  BatchUpdateResult,
  InsertVersionsResult,
} from '@trailkeep/repositories';

export type IdStrategy = 'sequence' | 'max';

/**
 * Everything a plan needs beyond the changeset. Built by the trail from its
 * configuration and the per-call options.
 */
export type PlanOptions<M extends string, V extends string> = {
  modelKey: M;
  versionKey: V;
  attribution: VersionAttribution;

  /**
   * Time written to timestamps and `deleted_at`
   */
  now: Date;
};

export type StrictPlanOptions<M extends string, V extends string> = PlanOptions<M, V> & {
  idStrategy: IdStrategy;
};

export type BulkPlanOptions<M extends string, V extends string> = PlanOptions<M, V> & {
  strictMode: boolean;

  /**
   * Return inserted rows or written versions, not only counts
   */
  returning: boolean;
};

export type VersionedData<M extends string, V extends string> = Record<M, StoredRecord> &
  Record<V, Version>;

/**
 * An update without changes writes no version
 */
export type VersionedUpdateData<M extends string, V extends string> = Record<M, StoredRecord> &
  Record<V, Version | null>;

export type BulkVersionKey<V extends string> = `${V}:${number}`;

export type BulkInsertData<M extends string, V extends string> = Record<M, BatchInsertResult> &
  Record<BulkVersionKey<V>, Version>;

export type BulkUpdateData<M extends string, V extends string> = Record<M, BatchUpdateResult> &
  Record<V, InsertVersionsResult>;
