// @trailkeep/protocol
// Shared types and the changeset layer used by the repositories and runtime.

export * from './types/index.js';

export { defineModel, type DefineModelInput } from './validation/models.js';
export {
  changeset,
  change,
  dropChanges,
  applyChanges,
  hasChanges,
  isChangeSet,
} from './validation/changeset.js';
export { isDeepEqual } from './validation/equality.js';
