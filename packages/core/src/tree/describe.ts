import type { Branch } from './branch.js';
import type { BranchSet } from './branch-set.js';

/**
 * `b1<c1 c2>`: the branch id followed by its child set, if any
 */
export function describeBranch(branch: Branch): string {
  return branch.bset
    ? `${branch.branchId}${describeBranchSet(branch.bset)}`
    : branch.branchId;
}

/**
 * `<b1 b2>`: the ids of the set's own branches
 */
export function describeBranchSet(bset: BranchSet): string {
  return `<${bset.branches.map((branch) => branch.branchId).join(' ')}>`;
}
