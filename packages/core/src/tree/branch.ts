import type { UncertaintyValue } from '../uncertainty/types.js';
import type { BranchSet } from './branch-set.js';
import { describeBranch } from './describe.js';

export interface BranchInit {
  /** Id of the branch set owning this branch */
  bsId: string;
  branchId: string;
  weight: number;
  value: UncertaintyValue;
  /** Child branch set, absent on leaves */
  bset?: BranchSet;
}

/**
 * One alternative within a branch set. Immutable once built.
 */
export class Branch {
  public readonly bsId: string;
  public readonly branchId: string;
  public readonly weight: number;
  public readonly value: UncertaintyValue;
  public readonly bset?: BranchSet;

  constructor(init: BranchInit) {
    this.bsId = init.bsId;
    this.branchId = init.branchId;
    this.weight = init.weight;
    this.value = init.value;
    this.bset = init.bset;
  }

  /**
   * Copy sharing value and child set, with another weight. Used for the
   * synthetic branch standing in for a collapsed level.
   */
  withWeight(weight: number): Branch {
    return new Branch({
      bsId: this.bsId,
      branchId: this.branchId,
      weight,
      value: this.value,
      bset: this.bset,
    });
  }

  toString(): string {
    return describeBranch(this);
  }
}
