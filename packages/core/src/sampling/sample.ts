/**
 * Seeded weighted sampling with replacement
 */

import type { Branch } from '../tree/branch.js';
import type { BranchSet } from '../tree/branch-set.js';
import { resolveOptions, type LogicTreeOptions } from '../types/options.js';
import { ContractViolationError } from '../types/errors.js';
import { XorShift32 } from '../util/rng.js';

/**
 * Anything carrying a weight, either plain or as `{ weight }` for
 * structured weights
 */
export interface Weighted {
  readonly weight: number | { readonly weight: number };
}

export function weightOf(obj: Weighted): number {
  return typeof obj.weight === 'number' ? obj.weight : obj.weight.weight;
}

const MAX_SEED = 0xffffffff;

/**
 * Seeds are uint32 integers; anything else would be truncated by the
 * generator and alias another seed.
 */
export function checkSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ContractViolationError(
      `seed must be an integer in [0, ${MAX_SEED}]`,
      { value: seed }
    );
  }
}

/**
 * Running sums of `weights` after checking they form a distribution
 */
export function cumulativeWeights(
  weights: readonly number[],
  tolerance: number
): number[] {
  if (weights.length === 0) {
    throw new ContractViolationError('cannot sample from an empty sequence');
  }
  const cumulative: number[] = [];
  let total = 0;
  for (const [index, weight] of weights.entries()) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ContractViolationError(
        `weight #${index} must be a finite non-negative number`,
        { value: weight }
      );
    }
    total += weight;
    cumulative.push(total);
  }
  if (Math.abs(total - 1) > tolerance) {
    throw new ContractViolationError(`weights sum to ${total}, expected 1`, {
      value: [...weights],
    });
  }
  return cumulative;
}

/**
 * Index of the bucket `rng` falls into. Draws landing past the last bucket
 * through rounding go to the last positive weight.
 */
export function drawIndex(
  cumulative: readonly number[],
  rng: XorShift32
): number {
  const total = cumulative.at(-1) ?? 0;
  const u = rng.nextFloat01() * total;
  let lastPositive = 0;
  for (const [index, bound] of cumulative.entries()) {
    const previous = index === 0 ? 0 : (cumulative[index - 1] ?? 0);
    if (bound > previous) lastPositive = index;
    if (u < bound) return index;
  }
  return lastPositive;
}

/**
 * Draws `numSamples` objects with replacement, each with probability equal
 * to its weight. The same seed and objects always give the same draws.
 *
 * @throws {ContractViolationError} On bad weights, seed or sample count
 */
export function sample<T extends Weighted>(
  weightedObjects: readonly T[],
  numSamples: number,
  seed: number,
  options: LogicTreeOptions = {}
): T[] {
  if (!Number.isInteger(numSamples) || numSamples < 0) {
    throw new ContractViolationError(
      'number of samples must be a non-negative integer',
      { value: numSamples }
    );
  }
  checkSeed(seed);
  const { sampling, weights } = resolveOptions(options);
  const cumulative = cumulativeWeights(
    weightedObjects.map(weightOf),
    weights.tolerance
  );
  const rng = new XorShift32(seed, sampling.stream);

  const draws: T[] = [];
  while (draws.length < numSamples) {
    const drawn = weightedObjects[drawIndex(cumulative, rng)];
    if (drawn === undefined) break;
    draws.push(drawn);
  }
  return draws;
}

/**
 * One branch per level from `root` down to a leaf. A single generator is
 * created for the call and advanced level by level; collapsed levels take
 * their first branch without drawing.
 */
export function sampleBranches(
  root: BranchSet,
  seed: number,
  options: LogicTreeOptions = {}
): Branch[] {
  checkSeed(seed);
  const { sampling, weights, guards } = resolveOptions(options);
  const rng = new XorShift32(seed, sampling.stream);
  const branches: Branch[] = [];

  for (let bset: BranchSet | undefined = root; bset; ) {
    if (branches.length >= guards.maxDepth) {
      throw new ContractViolationError(
        `logic tree is deeper than guards.maxDepth (${guards.maxDepth})`,
        { setting: 'guards.maxDepth' }
      );
    }
    const branch: Branch | undefined = bset.collapsed
      ? bset.branches[0]
      : bset.branches[
          drawIndex(
            cumulativeWeights(
              bset.branches.map((b) => b.weight),
              weights.tolerance
            ),
            rng
          )
        ];
    if (!branch) break;
    branches.push(branch);
    bset = branch.bset;
  }
  return branches;
}
