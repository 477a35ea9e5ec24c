// Version history
export { getVersions, getVersion, walkVersionChain } from './history.js';
export {
  applyVersion,
  replayVersions,
  type ReplayVersionsOptions,
  type ReplayVersionsResult,
} from './replay.js';
