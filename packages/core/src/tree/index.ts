export { Branch, type BranchInit } from './branch.js';
export { BranchSet, type BranchSetInit, type BsetValue } from './branch-set.js';
export {
  FILTER_KEYS,
  checkFilters,
  filterSource,
  type BranchSetFilters,
  type FilterKey,
} from './filters.js';
export { enumeratePaths, levelBranches, type WeightedPath } from './enumerate.js';
export { describeBranch, describeBranchSet } from './describe.js';
export { checkWeights, type WeightMismatch } from './weights.js';
