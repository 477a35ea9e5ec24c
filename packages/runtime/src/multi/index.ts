// Transactional step composition
export {
  Multi,
  changesetRecordId,
  type StepMap,
  type StepFn,
  type MergeFn,
  type StepKind,
  type RunOptions,
  type Step,
  type StepDescriptor,
} from './multi.js';
export { transact, type TransactOptions } from './transact.js';
