// Versioned operation plans
export { planInsert, planUpdate, planDelete, planSoftDelete, PREVIOUS_RECORD_STEP } from './operations.js';
export {
  planStrictInsert,
  planStrictUpdate,
  planStrictSoftDelete,
  INITIAL_VERSION_STEP,
} from './strict.js';
export { planInsertAll, planUpdateAll, planSoftDeleteAll, INSERTED_ROWS_STEP } from './bulk.js';
export { insertValues, updateValues } from './values.js';
export type {
  IdStrategy,
  PlanOptions,
  StrictPlanOptions,
  BulkPlanOptions,
  VersionedData,
  VersionedUpdateData,
  BulkVersionKey,
  BulkInsertData,
  BulkUpdateData,
} from './types.js';
