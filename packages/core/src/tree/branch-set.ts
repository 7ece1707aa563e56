/**
 * Branch sets: one level of alternatives in a logic tree
 */

import type { SeismicSource } from '../source/types.js';
import { resolveOptions, type LogicTreeOptions } from '../types/options.js';
import {
  BranchNotFoundError,
  ContractViolationError,
  LogicTreePathError,
} from '../types/errors.js';
import type { UncertaintyType, UncertaintyValue } from '../uncertainty/types.js';
import { sampleBranches } from '../sampling/sample.js';
import type { Branch } from './branch.js';
import { describeBranchSet } from './describe.js';
import { enumeratePaths, type WeightedPath } from './enumerate.js';
import { checkFilters, filterSource, type BranchSetFilters } from './filters.js';

export interface BranchSetInit {
  /** Defaults to the empty string for anonymous sets */
  id?: string;
  uncertaintyType: UncertaintyType;
  filters?: BranchSetFilters;
  /** Fan sources out over every branch instead of choosing one */
  collapsed?: boolean;
  branches: readonly Branch[];
}

export type BsetValue = readonly [BranchSet, UncertaintyValue];

export class BranchSet {
  public readonly id: string;
  public readonly uncertaintyType: UncertaintyType;
  public readonly filters: Readonly<BranchSetFilters>;
  public readonly collapsed: boolean;
  public readonly branches: readonly Branch[];

  constructor(init: BranchSetInit) {
    if (init.branches.length === 0) {
      throw new ContractViolationError(
        `branch set '${init.id ?? ''}' has no branches`,
        { uncertaintyType: init.uncertaintyType }
      );
    }
    const filters = { ...init.filters };
    checkFilters(filters);

    this.id = init.id ?? '';
    this.uncertaintyType = init.uncertaintyType;
    this.filters = Object.freeze(filters);
    this.collapsed = init.collapsed ?? false;
    this.branches = Object.freeze([...init.branches]);
  }

  /**
   * @throws {BranchNotFoundError} When no branch carries `branchId`
   */
  get(branchId: string): Branch {
    const branch = this.branches.find((b) => b.branchId === branchId);
    if (!branch) throw new BranchNotFoundError(branchId, this.toString());
    return branch;
  }

  filterSource(source: SeismicSource | undefined): boolean {
    return filterSource(this.filters, source);
  }

  /**
   * Walks down from this set taking one id per level and collects the
   * `[bset, value]` pairs met on the way. Stops when the ids run out or the
   * chosen branch has no child set; leftover ids raise under the strict
   * path policy and are dropped otherwise.
   */
  getBsetValues(
    ltPath: readonly string[],
    options: LogicTreeOptions = {}
  ): BsetValue[] {
    const { pathPolicy } = resolveOptions(options);
    const pairs: BsetValue[] = [];
    let bset: BranchSet | undefined = this;
    let index = 0;
    let last: Branch | undefined;

    while (bset && index < ltPath.length) {
      const branchId = ltPath[index];
      if (branchId === undefined) break;
      last = bset.get(branchId);
      pairs.push([bset, last.value]);
      bset = last.bset;
      index += 1;
    }

    if (index < ltPath.length && last && pathPolicy === 'strict') {
      throw new LogicTreePathError(ltPath.slice(index), last.branchId);
    }
    return pairs;
  }

  /**
   * Fresh lazy sequence of every `{ weight, path }` below this set
   */
  enumeratePaths(
    options: LogicTreeOptions = {}
  ): Generator<WeightedPath, void, undefined> {
    const { guards } = resolveOptions(options);
    return enumeratePaths(this, guards.maxDepth);
  }

  /**
   * One branch per level drawn with a generator seeded from `seed`.
   * Collapsed levels take their first branch.
   */
  sample(seed: number, options: LogicTreeOptions = {}): Branch[] {
    return sampleBranches(this, seed, resolveOptions(options));
  }

  toString(): string {
    return describeBranchSet(this);
  }
}
