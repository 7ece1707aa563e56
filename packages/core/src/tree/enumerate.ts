import { ContractViolationError } from '../types/errors.js';
import type { Branch } from './branch.js';
import type { BranchSet } from './branch-set.js';

export interface WeightedPath {
  /** Product of the path's branch weights, root first */
  readonly weight: number;
  readonly path: readonly Branch[];
}

/**
 * Branches a level contributes to paths: all of them, or for a collapsed
 * set a single copy of the first branch carrying the whole weight
 */
export function levelBranches(bset: BranchSet): readonly Branch[] {
  const [first] = bset.branches;
  if (bset.collapsed && first) return [first.withWeight(1)];
  return bset.branches;
}

interface Frame {
  readonly branches: readonly Branch[];
  index: number;
}

function pathWeight(path: readonly Branch[]): number {
  let weight = 1;
  for (const branch of path) weight *= branch.weight;
  return weight;
}

/**
 * Depth-first, root-first walk over every path below `root`, branches in
 * declaration order. Uses an explicit stack so tree depth never grows the
 * call stack; `maxDepth` bounds the number of levels.
 */
export function* enumeratePaths(
  root: BranchSet,
  maxDepth: number
): Generator<WeightedPath, void, undefined> {
  const stack: Frame[] = [{ branches: levelBranches(root), index: 0 }];
  // prefix[i] is the branch chosen at level i for every frame above it
  const prefix: Branch[] = [];

  for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
    const branch = frame.branches[frame.index];
    if (!branch) {
      stack.pop();
      prefix.pop();
      continue;
    }
    frame.index += 1;

    if (branch.bset) {
      if (stack.length >= maxDepth) {
        throw new ContractViolationError(
          `logic tree is deeper than guards.maxDepth (${maxDepth})`,
          { branchId: branch.branchId, setting: 'guards.maxDepth' }
        );
      }
      prefix.push(branch);
      stack.push({ branches: levelBranches(branch.bset), index: 0 });
      continue;
    }

    const path = [...prefix, branch];
    yield { weight: pathWeight(path), path };
  }
}
