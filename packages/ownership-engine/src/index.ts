export {
  buildOwnershipIndex,
  type BuildOwnershipIndexInput,
  type OwnershipBuildProgressEvent,
  type OwnershipIndexAvailable,
  type OwnershipIndexBuildResult,
  type OwnershipIndexUnavailable,
} from "./application/build-ownership-index.js";
export {
  createOwnershipReport,
  type OwnershipReportOptions,
} from "./application/create-ownership-report.js";
export { aggregateOwnership } from "./domain/directory-aggregator.js";
export { scoreFile, scoreFileLines } from "./domain/file-scorer.js";
export { OwnershipIndex } from "./domain/ownership-index.js";
export { assertValidSelection, selectTopOwners } from "./domain/ownership-query.js";
export { createEmptyOwnershipSet, createOwnershipSet } from "./domain/ownership-set.js";
export {
  DEFAULT_OWNERSHIP_CONFIG,
  type OwnershipComputationConfig,
  type OwnershipIndexEntry,
} from "./domain/ownership-types.js";
export { REPOSITORY_ROOT_PATH } from "./domain/path-tree.js";
export { compareOwnership, createScore, scoreFraction } from "./domain/score.js";
