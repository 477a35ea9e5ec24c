// Result shaping
//
// Normalizes a transaction outcome into what the caller gets back: the
// step results on success, or the failing step with its error value and
// the results that were already produced.

import type { ChangeSet } from '@trailkeep/protocol';
import { LINKAGE_ATTRIBUTES, dropChanges, isChangeSet } from '@trailkeep/protocol';
import { InvalidChangesetError, StepFailedError, UnknownStepError } from '../errors.js';
import type { StepMap } from '../multi/multi.js';

export type TransactSuccess<T> = {
  success: true;
  data: T;
};

export type TransactFailure = {
  success: false;

  /**
   * Name of the step that failed
   */
  failedStep: string;

  /**
   * The step's error value: an invalid changeset, a persistence error, or
   * whatever the step threw
   */
  error: unknown;

  /**
   * Results of the steps that succeeded before the failure
   */
  completed: StepMap;
};

export type TransactResult<T> = TransactSuccess<T> | TransactFailure;

/**
 * What a result holds when `returnOperation` selects key `K` of `D`.
 */
export type Returned<D, K> = [K] extends [keyof D] ? D[K] : D;

/**
 * Public results, or the single one `returnOperation` names.
 *
 * @throws UnknownStepError if `returnOperation` is not among the results
 */
export function selectResult(results: StepMap, returnOperation: string | undefined): unknown {
  if (returnOperation === undefined) return results;
  if (!(returnOperation in results)) {
    throw new UnknownStepError(returnOperation, Object.keys(results));
  }
  return results[returnOperation];
}

/**
 * Remove the strict-mode linkage attributes from a changeset's changes.
 */
export function stripLinkage(cs: ChangeSet): ChangeSet {
  return dropChanges(cs, LINKAGE_ATTRIBUTES);
}

export function shapeFailure(
  failedStep: string,
  error: unknown,
  completed: StepMap,
  options: { strictMode?: boolean } = {}
): TransactFailure {
  let value = error instanceof StepFailedError ? error.value : error;
  if (options.strictMode && isChangeSet(value)) {
    value = stripLinkage(value);
  }

  return {
    success: false,
    failedStep,
    error: value,
    completed: { ...completed },
  };
}

/**
 * Data of a successful result, or a throw for a failed one.
 *
 * @throws InvalidChangesetError when the failure carries a changeset
 * @throws the failure's error when it is an Error
 * @throws StepFailedError wrapping any other error value
 */
export function unwrapResult<T>(result: TransactResult<T>): T {
  if (result.success) return result.data;

  const { error, failedStep } = result;
  if (isChangeSet(error)) throw new InvalidChangesetError(error, failedStep);
  if (error instanceof Error) throw error;
  throw new StepFailedError(failedStep, error);
}
