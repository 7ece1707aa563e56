import type { BranchSet } from './branch-set.js';

export interface WeightMismatch {
  readonly bset: BranchSet;
  readonly sum: number;
}

/**
 * Branch sets below (and including) `root` whose branch weights are not
 * all in (0, 1] or do not sum to 1 within `tolerance`
 */
export function checkWeights(
  root: BranchSet,
  tolerance: number
): WeightMismatch[] {
  const mismatches: WeightMismatch[] = [];
  const pending: BranchSet[] = [root];

  for (let bset = pending.pop(); bset; bset = pending.pop()) {
    let sum = 0;
    let inRange = true;
    for (const branch of bset.branches) {
      sum += branch.weight;
      if (!(branch.weight > 0 && branch.weight <= 1)) inRange = false;
      if (branch.bset) pending.push(branch.bset);
    }
    if (!inRange || Math.abs(sum - 1) > tolerance) {
      mismatches.push({ bset, sum });
    }
  }
  return mismatches;
}
