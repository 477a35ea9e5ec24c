// Multi - an ordered plan of named transaction steps
//
// A Multi is built up front and executed by `transact` inside one
// transaction. Each step sees the results of the steps before it. Building
// is immutable: every method returns a new Multi.

import type {
  AttributeMap,
  ChangeSet,
  Model,
  RecordId,
  StoredRecord,
  WhereClause,
} from '@trailkeep/protocol';
import { applyChanges, hasChanges } from '@trailkeep/protocol';
import type {
  BatchInsertResult,
  BatchUpdateResult,
  InsertAllOptions,
  RepositoryContext,
} from '@trailkeep/repositories';
import { DuplicateStepError, StepFailedError, TrailError } from '../errors.js';

/**
 * Results of the steps run so far, keyed by step name
 */
export type StepMap = Record<string, unknown>;

export type StepFn<R, T> = (repos: RepositoryContext, results: R) => Promise<T> | T;

export type MergeFn<R> = (
  repos: RepositoryContext,
  results: R
) => Multi<StepMap, StepMap> | Promise<Multi<StepMap, StepMap>>;

export type StepKind =
  | 'run'
  | 'insert'
  | 'update'
  | 'delete'
  | 'insert_all'
  | 'update_all'
  | 'merge'
  | 'error';

export type RunOptions = {
  /**
   * Changeset checked before the transaction opens
   */
  changeset?: ChangeSet;
};

export type InternalStepOptions = {
  /**
   * Public step a failure of this step is reported under
   */
  reportAs?: string;
};

export interface Step {
  readonly name: string;
  readonly kind: StepKind;

  /**
   * Internal steps are bookkeeping; their results are visible to later
   * steps but never returned to the caller.
   */
  readonly internal: boolean;

  /**
   * Plan the step was declared in. Internal names are private to it, so
   * plans combined with `append` or `prepend` keep their own bookkeeping.
   */
  readonly scope: symbol;

  readonly reportAs: string | null;

  readonly changeset: ChangeSet | null;

  execute(repos: RepositoryContext, results: StepMap): unknown;
}

export type StepDescriptor = Pick<Step, 'name' | 'kind' | 'internal'>;

interface StepInput {
  readonly name: string;
  readonly kind: StepKind;
  readonly internal: boolean;
  readonly changeset?: ChangeSet | null;
  readonly reportAs?: string;
  execute(repos: RepositoryContext, results: StepMap): unknown;
}

/**
 * Public names are unique across the plan; internal names only within the
 * plan that declared them, and never equal to a public name.
 */
function checkStepNames(steps: readonly Step[]): void {
  const publicNames = new Set<string>();
  const internalNames = new Set<string>();
  const scopedNames = new Map<symbol, Set<string>>();

  for (const step of steps) {
    const scoped = scopedNames.get(step.scope) ?? new Set<string>();
    scopedNames.set(step.scope, scoped);

    const taken = step.internal
      ? publicNames.has(step.name) || scoped.has(step.name)
      : publicNames.has(step.name) || internalNames.has(step.name);
    if (taken) throw new DuplicateStepError(step.name);

    if (step.internal) {
      scoped.add(step.name);
      internalNames.add(step.name);
    } else {
      publicNames.add(step.name);
    }
  }
}

/**
 * Id of a record the changeset was built from.
 */
export function changesetRecordId(cs: ChangeSet): RecordId {
  const id = cs.data.id;
  if (typeof id !== 'number') {
    throw new TrailError(
      'MISSING_RECORD_ID',
      `${cs.model.name} changeset has no numeric id; build it from a persisted record`
    );
  }
  return id;
}

/**
 * `R` types every result a step can read, `D` the results returned to the
 * caller (`R` without internal steps).
 */
export class Multi<R extends StepMap = StepMap, D extends StepMap = StepMap> {
  private readonly steps: readonly Step[];
  private readonly scope: symbol;

  constructor(steps: readonly Step[] = [], scope: symbol = Symbol('multi')) {
    checkStepNames(steps);
    this.steps = steps;
    this.scope = scope;
  }

  static new(): Multi {
    return new Multi();
  }

  private add<R2 extends StepMap, D2 extends StepMap>(step: StepInput): Multi<R2, D2> {
    const scoped: Step = {
      ...step,
      changeset: step.changeset ?? null,
      reportAs: step.reportAs ?? null,
      scope: this.scope,
    };
    return new Multi([...this.steps, scoped], this.scope);
  }

  /**
   * Whether a public step, or an internal step of this plan, has `name`
   */
  has(name: string): boolean {
    return this.steps.some(
      (step) => step.name === name && (!step.internal || step.scope === this.scope)
    );
  }

  /**
   * Run an arbitrary function as a step. Throwing from it fails the step.
   */
  run<K extends string, T>(
    name: K,
    fn: StepFn<R, T>,
    options: RunOptions = {}
  ): Multi<R & Record<K, T>, D & Record<K, T>> {
    return this.add({ name, kind: 'run', internal: false, changeset: options.changeset, execute: fn });
  }

  /**
   * Like `run`, but the result is stripped from what the caller gets back
   * and the name is private to this plan.
   */
  runInternal<K extends string, T>(
    name: K,
    fn: StepFn<R, T>,
    options: InternalStepOptions = {}
  ): Multi<R & Record<K, T>, D> {
    return this.add({ name, kind: 'run', internal: true, reportAs: options.reportAs, execute: fn });
  }

  insert<K extends string>(
    name: K,
    cs: ChangeSet
  ): Multi<R & Record<K, StoredRecord>, D & Record<K, StoredRecord>> {
    return this.add({
      name,
      kind: 'insert',
      internal: false,
      changeset: cs,
      execute: (repos: RepositoryContext) => repos.records.insert(cs.model.table, applyChanges(cs)),
    });
  }

  /**
   * Update the changeset's record. Without changes the record is returned
   * as it is and nothing is written.
   */
  update<K extends string>(
    name: K,
    cs: ChangeSet
  ): Multi<R & Record<K, StoredRecord>, D & Record<K, StoredRecord>> {
    return this.add({
      name,
      kind: 'update',
      internal: false,
      changeset: cs,
      execute: (repos: RepositoryContext) => {
        const id = changesetRecordId(cs);
        if (!hasChanges(cs)) return { ...cs.data, id };
        return repos.records.update(cs.model.table, id, cs.changes);
      },
    });
  }

  delete<K extends string>(
    name: K,
    cs: ChangeSet
  ): Multi<R & Record<K, StoredRecord>, D & Record<K, StoredRecord>> {
    return this.add({
      name,
      kind: 'delete',
      internal: false,
      changeset: cs,
      execute: (repos: RepositoryContext) =>
        repos.records.delete(cs.model.table, changesetRecordId(cs)),
    });
  }

  insertAll<K extends string>(
    name: K,
    model: Model,
    rows: AttributeMap[],
    options: InsertAllOptions = {}
  ): Multi<R & Record<K, BatchInsertResult>, D & Record<K, BatchInsertResult>> {
    return this.add({
      name,
      kind: 'insert_all',
      internal: false,
      execute: (repos: RepositoryContext) => repos.records.insertAll(model.table, rows, options),
    });
  }

  updateAll<K extends string>(
    name: K,
    model: Model,
    where: WhereClause,
    set: AttributeMap
  ): Multi<R & Record<K, BatchUpdateResult>, D & Record<K, BatchUpdateResult>> {
    return this.add({
      name,
      kind: 'update_all',
      internal: false,
      execute: (repos: RepositoryContext) => repos.records.updateAll(model.table, where, set),
    });
  }

  /**
   * Add steps computed at run time from earlier results. The steps of the
   * returned Multi run right away, before the next step of this one.
   *
   * `Added` declares the results the merged steps contribute. Merge steps
   * are internal and named `merge:N` by position within this plan.
   */
  merge<Added extends StepMap = StepMap>(
    fn: MergeFn<R>,
    options: InternalStepOptions = {}
  ): Multi<R & Added, D & Added> {
    const position = this.steps.filter(
      (step) => step.kind === 'merge' && step.scope === this.scope
    ).length;
    return this.add({
      name: `merge:${position + 1}`,
      kind: 'merge',
      internal: true,
      reportAs: options.reportAs,
      execute: fn,
    });
  }

  /**
   * A step that always fails with `value`.
   */
  error<K extends string>(name: K, value: unknown): Multi<R & Record<K, never>, D & Record<K, never>> {
    return this.add({
      name,
      kind: 'error',
      internal: false,
      execute: () => {
        throw new StepFailedError(name, value);
      },
    });
  }

  append<R2 extends StepMap, D2 extends StepMap>(other: Multi<R2, D2>): Multi<R & R2, D & D2> {
    return new Multi([...this.steps, ...other.steps], this.scope);
  }

  prepend<R2 extends StepMap, D2 extends StepMap>(other: Multi<R2, D2>): Multi<R2 & R, D2 & D> {
    return new Multi([...other.steps, ...this.steps], this.scope);
  }

  /**
   * Steps in execution order
   */
  toList(): StepDescriptor[] {
    return this.steps.map(({ name, kind, internal }) => ({ name, kind, internal }));
  }

  /**
   * Full step definitions, for the executor
   */
  entries(): readonly Step[] {
    return this.steps;
  }
}
