// Execute a Multi inside one transaction

import type {
  IsolationLevel,
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@trailkeep/repositories';
import { DuplicateStepError, StepFailedError } from '../errors.js';
import { silentLogger, type TrailLogger } from '../logger.js';
import {
  selectResult,
  shapeFailure,
  type Returned,
  type TransactResult,
} from '../result/shape.js';
import { Multi, type Step, type StepMap } from './multi.js';

export type TransactOptions<K> = {
  /**
   * Return only this step's result instead of the whole map
   */
  returnOperation?: K;

  isolationLevel?: IsolationLevel;

  /**
   * Strip strict-mode linkage attributes from changesets in failures
   */
  strictMode?: boolean;

  logger?: TrailLogger;
};

type RunState = {
  /**
   * Results of public steps
   */
  results: StepMap;

  /**
   * Results of internal steps, per declaring plan
   */
  scoped: Map<symbol, StepMap>;

  logger: TrailLogger;
};

function scopedResults(state: RunState, scope: symbol): StepMap {
  let results = state.scoped.get(scope);
  if (!results) {
    results = {};
    state.scoped.set(scope, results);
  }
  return results;
}

async function runSteps(
  repos: RepositoryContext,
  steps: readonly Step[],
  state: RunState
): Promise<void> {
  for (const step of steps) {
    const reported = step.reportAs ?? step.name;
    const own = scopedResults(state, step.scope);
    const target = step.internal ? own : state.results;
    state.logger.debug('Running step', { step: step.name, kind: step.kind });

    if (step.name in target) {
      throw new StepFailedError(reported, new DuplicateStepError(step.name));
    }

    let value: unknown;
    try {
      value = await step.execute(repos, { ...state.results, ...own });
    } catch (error) {
      if (error instanceof StepFailedError) throw error;
      throw new StepFailedError(reported, error);
    }

    if (step.kind === 'merge') {
      if (!(value instanceof Multi)) {
        throw new StepFailedError(reported, new TypeError('merge must return a Multi'));
      }
      const merged = value.entries();
      const clash = merged.find((s) => !s.internal && (s.name in state.results || s.name in own));
      if (clash) {
        throw new StepFailedError(reported, new DuplicateStepError(clash.name));
      }
      await runSteps(repos, merged, state);
      continue;
    }

    target[step.name] = value;
  }
}

/**
 * Run every step of `multi` in order inside one transaction.
 *
 * Changesets attached to steps are checked first; an invalid one fails
 * with its step's name and no transaction is opened. Any step that throws
 * rolls the whole transaction back.
 *
 * @throws UnknownStepError if `returnOperation` names no returned step
 */
export async function transact<
  R extends StepMap,
  D extends StepMap,
  K extends (keyof D & string) | undefined = undefined,
>(
  repos: TransactionalRepositoryContext,
  multi: Multi<R, D>,
  options: TransactOptions<K> = {}
): Promise<TransactResult<Returned<D, K>>> {
  const logger = options.logger ?? silentLogger;
  const steps = multi.entries();

  for (const step of steps) {
    if (step.changeset && !step.changeset.valid) {
      logger.warn('Invalid changeset', {
        step: step.name,
        model: step.changeset.model.name,
        errors: step.changeset.errors,
      });
      return shapeFailure(step.name, step.changeset, {}, options);
    }
  }

  const state: RunState = { results: {}, scoped: new Map(), logger };

  try {
    const data = await repos.transaction(
      async (tx) => {
        await runSteps(tx, steps, state);
        return selectResult(state.results, options.returnOperation);
      },
      { isolationLevel: options.isolationLevel }
    );

    logger.info('Transaction committed', {
      steps: Object.keys(state.results),
    });

    // Results are assembled at run time; the builder's types describe them.
    return { success: true, data: data as Returned<D, K> };
  } catch (error) {
    if (!(error instanceof StepFailedError)) throw error;

    logger.warn('Transaction rolled back', {
      step: error.step,
      error: error.value instanceof Error ? error.value.message : String(error.value),
    });
    return shapeFailure(error.step, error, state.results, options);
  }
}
