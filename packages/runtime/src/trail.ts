// Trail - versioned operations over one repository context
//
// Every operation builds a plan (a Multi) and runs it in one transaction,
// so a record never changes without its version and vice versa.

import type {
  AttributeMap,
  ChangeSet,
  Model,
  RecordId,
  StoredRecord,
  Version,
  VersionAttribution,
  WhereClause,
} from '@trailkeep/protocol';
import type { IsolationLevel, TransactionalRepositoryContext } from '@trailkeep/repositories';
import { resolveTrailOptions, type TrailSettings } from './config.js';
import { getVersion, getVersions, walkVersionChain } from './history/history.js';
import { silentLogger, withLogContext, type TrailLogger } from './logger.js';
import { transact } from './multi/transact.js';
import type { Multi, StepMap } from './multi/multi.js';
import type { Returned, TransactResult } from './result/shape.js';
import {
  planDelete,
  planInsert,
  planInsertAll,
  planSoftDelete,
  planSoftDeleteAll,
  planStrictInsert,
  planStrictUpdate,
  planStrictSoftDelete,
  planUpdate,
  planUpdateAll,
} from './versioning/index.js';
import type {
  BulkInsertData,
  BulkPlanOptions,
  BulkUpdateData,
  IdStrategy,
  PlanOptions,
  VersionedData,
  VersionedUpdateData,
} from './versioning/types.js';

export type TrailConfig = {
  repos: TransactionalRepositoryContext;

  /**
   * Link every record to its versions (default: false)
   */
  strictMode?: boolean;

  /**
   * How strict mode reserves ids (default: 'sequence')
   */
  idStrategy?: IdStrategy;

  logger?: TrailLogger;

  /**
   * Source of timestamps (default: the system clock)
   */
  clock?: () => Date;
};

export type OperationOptions<K> = VersionAttribution & {
  /**
   * Return only this step's result
   */
  returnOperation?: K;
};

export type BulkOperationOptions<K> = OperationOptions<K> & {
  /**
   * Include inserted rows or written versions in the result
   */
  returning?: boolean;
};

type ResolvedTrailConfig<MK extends string, VK extends string> = TrailSettings & {
  repos: TransactionalRepositoryContext;
  modelKey: MK;
  versionKey: VK;
  logger: TrailLogger;
  clock: () => Date;
};

export class Trail<MK extends string = 'model', VK extends string = 'version'> {
  readonly repos: TransactionalRepositoryContext;
  readonly strictMode: boolean;
  readonly idStrategy: IdStrategy;
  readonly modelKey: MK;
  readonly versionKey: VK;
  private readonly logger: TrailLogger;
  private readonly clock: () => Date;

  constructor(config: ResolvedTrailConfig<MK, VK>) {
    this.repos = config.repos;
    this.strictMode = config.strictMode;
    this.idStrategy = config.idStrategy;
    this.modelKey = config.modelKey;
    this.versionKey = config.versionKey;
    this.logger = config.logger;
    this.clock = config.clock;
  }

  private planOptions(attribution: VersionAttribution): PlanOptions<MK, VK> {
    return {
      modelKey: this.modelKey,
      versionKey: this.versionKey,
      attribution: {
        originatorId: attribution.originatorId,
        origin: attribution.origin,
        meta: attribution.meta,
      },
      now: this.clock(),
    };
  }

  private bulkOptions(options: BulkOperationOptions<unknown>): BulkPlanOptions<MK, VK> {
    return {
      ...this.planOptions(options),
      strictMode: this.strictMode,
      returning: options.returning ?? false,
    };
  }

  /**
   * Max-id prediction only holds while no other writer commits, so strict
   * writes using it run serializable.
   */
  private isolationLevel(): IsolationLevel | undefined {
    return this.strictMode && this.idStrategy === 'max' ? 'serializable' : undefined;
  }

  /**
   * Run any plan with this trail's logger and strict-mode shaping.
   */
  transact<R extends StepMap, D extends StepMap, K extends (keyof D & string) | undefined = undefined>(
    multi: Multi<R, D>,
    options: { returnOperation?: K; isolationLevel?: IsolationLevel; logger?: TrailLogger } = {}
  ): Promise<TransactResult<Returned<D, K>>> {
    return transact(this.repos, multi, {
      returnOperation: options.returnOperation,
      isolationLevel: options.isolationLevel ?? this.isolationLevel(),
      strictMode: this.strictMode,
      logger: options.logger ?? this.logger,
    });
  }

  /**
   * Built-in operations log with the operation and model they act on.
   */
  private runOperation<
    R extends StepMap,
    D extends StepMap,
    K extends (keyof D & string) | undefined = undefined,
  >(
    operation: string,
    model: Model,
    multi: Multi<R, D>,
    returnOperation?: K
  ): Promise<TransactResult<Returned<D, K>>> {
    return this.transact(multi, {
      returnOperation,
      logger: withLogContext(this.logger, { operation, itemType: model.name }),
    });
  }

  async insert<K extends MK | VK | undefined = undefined>(
    cs: ChangeSet,
    options: OperationOptions<K> = {}
  ): Promise<TransactResult<Returned<VersionedData<MK, VK>, K>>> {
    const plan = this.strictMode
      ? planStrictInsert(cs, { ...this.planOptions(options), idStrategy: this.idStrategy })
      : planInsert(cs, this.planOptions(options));
    return this.runOperation('insert', cs.model, plan, options.returnOperation);
  }

  /**
   * Update a record. Without changes nothing is written and the version
   * result is null.
   */
  async update<K extends MK | VK | undefined = undefined>(
    cs: ChangeSet,
    options: OperationOptions<K> = {}
  ): Promise<TransactResult<Returned<VersionedUpdateData<MK, VK>, K>>> {
    const plan = this.strictMode
      ? planStrictUpdate(cs, { ...this.planOptions(options), idStrategy: this.idStrategy })
      : planUpdate(cs, this.planOptions(options));
    return this.runOperation('update', cs.model, plan, options.returnOperation);
  }

  async delete<K extends MK | VK | undefined = undefined>(
    cs: ChangeSet,
    options: OperationOptions<K> = {}
  ): Promise<TransactResult<Returned<VersionedData<MK, VK>, K>>> {
    return this.runOperation(
      'delete',
      cs.model,
      planDelete(cs, this.planOptions(options)),
      options.returnOperation
    );
  }

  /**
   * Set `deleted_at`. In strict mode the record also moves its
   * `current_version_id` to the new version.
   */
  async softDelete<K extends MK | VK | undefined = undefined>(
    cs: ChangeSet,
    options: OperationOptions<K> = {}
  ): Promise<TransactResult<Returned<VersionedData<MK, VK>, K>>> {
    const plan = this.strictMode
      ? planStrictSoftDelete(cs, { ...this.planOptions(options), idStrategy: this.idStrategy })
      : planSoftDelete(cs, this.planOptions(options));
    return this.runOperation('softDelete', cs.model, plan, options.returnOperation);
  }

  /**
   * @throws UnsupportedOperationError in strict mode, before anything is written
   */
  async insertAll<K extends MK | undefined = undefined>(
    model: Model,
    entries: AttributeMap[],
    options: BulkOperationOptions<K> = {}
  ): Promise<TransactResult<Returned<BulkInsertData<MK, VK>, K>>> {
    return this.runOperation(
      'insertAll',
      model,
      planInsertAll(model, entries, this.bulkOptions(options)),
      options.returnOperation
    );
  }

  /**
   * @throws UnsupportedOperationError in strict mode, before anything is written
   */
  async updateAll<K extends MK | VK | undefined = undefined>(
    model: Model,
    where: WhereClause,
    set: AttributeMap,
    options: BulkOperationOptions<K> = {}
  ): Promise<TransactResult<Returned<BulkUpdateData<MK, VK>, K>>> {
    return this.runOperation(
      'updateAll',
      model,
      planUpdateAll(model, where, set, this.bulkOptions(options)),
      options.returnOperation
    );
  }

  /**
   * @throws UnsupportedOperationError in strict mode or for models that do
   * not soft delete, before anything is written
   */
  async softDeleteAll<K extends MK | VK | undefined = undefined>(
    model: Model,
    where: WhereClause,
    options: BulkOperationOptions<K> = {}
  ): Promise<TransactResult<Returned<BulkUpdateData<MK, VK>, K>>> {
    return this.runOperation(
      'softDeleteAll',
      model,
      planSoftDeleteAll(model, where, this.bulkOptions(options)),
      options.returnOperation
    );
  }

  versions(model: Model, id: RecordId): Promise<Version[]> {
    return getVersions(this.repos, model, id);
  }

  latestVersion(model: Model, id: RecordId): Promise<Version | null> {
    return getVersion(this.repos, model, id);
  }

  versionChain(model: Model, record: StoredRecord): Promise<Version[]> {
    return walkVersionChain(this.repos, model, record);
  }
}

/**
 * Create a trail over a transactional repository context.
 *
 * Usage:
 * ```ts
 * const trail = createTrail({ repos, strictMode: true });
 * const result = await trail.insert(changeset(Company, {}, { name: 'Acme LLC' }));
 * if (result.success) {
 *   console.log(result.data.model.id, result.data.version.id);
 * }
 * ```
 *
 * Step keys default to `model` and `version`; custom keys are given together.
 *
 * @throws ConfigurationError for invalid options
 */
export function createTrail(config: TrailConfig): Trail;
export function createTrail<MK extends string, VK extends string>(
  config: TrailConfig & { modelKey: MK; versionKey: VK }
): Trail<MK, VK>;
export function createTrail(
  config: TrailConfig & { modelKey?: string; versionKey?: string }
): Trail<string, string> {
  const settings = resolveTrailOptions({
    strictMode: config.strictMode,
    idStrategy: config.idStrategy,
    modelKey: config.modelKey,
    versionKey: config.versionKey,
  });

  return new Trail({
    ...settings,
    repos: config.repos,
    logger: config.logger ?? silentLogger,
    clock: config.clock ?? (() => new Date()),
  });
}
