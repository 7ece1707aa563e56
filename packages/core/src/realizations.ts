/**
 * Realizations: the logic-tree paths a calculation runs over, either every
 * path of the tree or a fixed number of seeded samples
 */

import { sampleBranches } from './sampling/sample.js';
import type { Branch } from './tree/branch.js';
import type { BranchSet, BsetValue } from './tree/branch-set.js';
import { enumeratePaths } from './tree/enumerate.js';
import { ConfigError } from './types/errors.js';
import { resolveOptions, type LogicTreeOptions } from './types/options.js';

export const DEFAULT_RANDOM_SEED = 42;

export interface Realization {
  /** Position in the realization sequence, from 0 */
  ordinal: number;
  weight: number;
  branches: readonly Branch[];
  ltPath: string[];
  /** `[bset, value]` pairs ready for `applyUncertainties` */
  values: BsetValue[];
}

export interface RealizationOptions extends LogicTreeOptions {
  /** 0 enumerates every path; n > 0 draws n samples (default: 0) */
  numberOfLogicTreeSamples?: number;
  /** Seed of the first sample; sample i uses `randomSeed + i` (default: 42) */
  randomSeed?: number;
}

/**
 * Pairs each branch of `path` with the branch set it was chosen from
 */
export function pathValues(
  root: BranchSet,
  path: readonly Branch[]
): BsetValue[] {
  const values: BsetValue[] = [];
  let bset: BranchSet | undefined = root;
  for (const branch of path) {
    if (!bset) break;
    values.push([bset, branch.value]);
    bset = branch.bset;
  }
  return values;
}

function toRealization(
  root: BranchSet,
  ordinal: number,
  weight: number,
  branches: readonly Branch[]
): Realization {
  return {
    ordinal,
    weight,
    branches,
    ltPath: branches.map((branch) => branch.branchId),
    values: pathValues(root, branches),
  };
}

function checkRealizationOptions(samples: number, seed: number): void {
  if (!Number.isInteger(samples) || samples < 0) {
    throw new ConfigError(
      'numberOfLogicTreeSamples must be a non-negative integer',
      'numberOfLogicTreeSamples'
    );
  }
  // Sample i is drawn with seed + i, which must stay a uint32 seed
  const lastSeed = seed + Math.max(samples - 1, 0);
  if (!Number.isInteger(seed) || seed < 0 || lastSeed > 0xffffffff) {
    throw new ConfigError(
      'randomSeed must be an integer in [0, 4294967295] for every sample',
      'randomSeed'
    );
  }
}

/**
 * Lazy sequence of realizations. Enumerated realizations carry their path
 * weight; sampled ones all weigh `1 / numberOfLogicTreeSamples`.
 */
export function* realizations(
  root: BranchSet,
  options: RealizationOptions = {}
): Generator<Realization, void, undefined> {
  const {
    numberOfLogicTreeSamples: samples = 0,
    randomSeed: seed = DEFAULT_RANDOM_SEED,
    ...treeOptions
  } = options;
  checkRealizationOptions(samples, seed);
  const resolved = resolveOptions(treeOptions);

  if (samples === 0) {
    let ordinal = 0;
    for (const { weight, path } of enumeratePaths(
      root,
      resolved.guards.maxDepth
    )) {
      yield toRealization(root, ordinal, weight, path);
      ordinal += 1;
    }
    return;
  }

  for (let ordinal = 0; ordinal < samples; ordinal++) {
    const branches = sampleBranches(root, seed + ordinal, resolved);
    yield toRealization(root, ordinal, 1 / samples, branches);
  }
}
