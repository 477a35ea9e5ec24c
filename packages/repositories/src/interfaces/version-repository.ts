import type {
  AttributeMap,
  RecordId,
  Version,
  VersionEvent,
  VersionPayload,
  WhereClause,
} from '@trailkeep/protocol';
import type { InsertAllOptions } from './record-repository.js';

/**
 * Input for appending a version. `id` is only given when it was reserved
 * beforehand.
 */
export type AppendVersionInput = VersionPayload & {
  id?: RecordId;
};

/**
 * The only mutation a version accepts: the strict-mode finalize patch,
 * applied inside the transaction that created the version.
 */
export type PatchVersionInput = {
  itemId?: RecordId;
  itemChanges?: AttributeMap;
};

/**
 * Template for projecting matching records into version rows.
 * Each matching record contributes its own `id` as the version's `itemId`.
 */
export type VersionProjection = Omit<VersionPayload, 'itemId'>;

/**
 * Records whose rows are projected into versions
 */
export type VersionProjectionSource = {
  table: string;
  where: WhereClause;
};

export type InsertVersionsResult = {
  count: number;
  versions: Version[] | null;
};

/**
 * Filter for querying the ledger
 */
export type VersionFilter = {
  itemType?: string;
  itemId?: RecordId;
  event?: VersionEvent;
  originatorId?: RecordId;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for the version ledger.
 *
 * The ledger is append-only. Versions come back ordered by id, which is the
 * order they were committed in.
 */
export interface VersionRepository {
  insert(input: AppendVersionInput): Promise<Version>;

  /**
   * Insert one version per record matching `source`, built from `projection`
   * and the record's current id, in a single statement.
   */
  insertFromQuery(
    source: VersionProjectionSource,
    projection: VersionProjection,
    options?: InsertAllOptions
  ): Promise<InsertVersionsResult>;

  /**
   * @throws RecordNotFoundError if no version has this id
   */
  patch(id: RecordId, input: PatchVersionInput): Promise<Version>;

  get(id: RecordId): Promise<Version | null>;

  list(filter?: VersionFilter): Promise<Version[]>;

  count(filter?: VersionFilter): Promise<number>;

  maxId(): Promise<number>;

  reserveId(): Promise<RecordId>;
}
