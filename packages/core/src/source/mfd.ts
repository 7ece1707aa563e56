import { ModificationError, UnsupportedModificationError } from '../types/errors.js';
import type { MagnitudeFrequencyDistribution, MfdModification } from './types.js';

interface TruncatedGRState {
  minMag: number;
  maxMag: number;
  binWidth: number;
  aVal: number;
  bVal: number;
}

/**
 * Truncated Gutenberg-Richter distribution, log10(N) = a - b * M
 */
export class TruncatedGRMFD implements MagnitudeFrequencyDistribution {
  readonly kind = 'truncatedGR' as const;
  private state: TruncatedGRState;

  constructor(
    minMag: number,
    maxMag: number,
    binWidth: number,
    aVal: number,
    bVal: number
  ) {
    const state = { minMag, maxMag, binWidth, aVal, bVal };
    TruncatedGRMFD.check(state);
    this.state = state;
  }

  get minMag(): number {
    return this.state.minMag;
  }
  get maxMag(): number {
    return this.state.maxMag;
  }
  get binWidth(): number {
    return this.state.binWidth;
  }
  get aVal(): number {
    return this.state.aVal;
  }
  get bVal(): number {
    return this.state.bVal;
  }

  modify(modification: MfdModification): void {
    const next: TruncatedGRState = { ...this.state };
    switch (modification.name) {
      case 'set_ab':
        next.aVal = modification.aVal;
        next.bVal = modification.bVal;
        break;
      case 'increment_b':
        next.bVal += modification.value;
        break;
      case 'increment_max_mag':
        next.maxMag += modification.value;
        break;
      case 'set_max_mag':
        next.maxMag = modification.value;
        break;
      default:
        throw new UnsupportedModificationError(modification.name, this.kind);
    }
    TruncatedGRMFD.check(next);
    this.state = next;
  }

  getMinMaxMag(): [number, number] {
    return [this.state.minMag, this.state.maxMag];
  }

  clone(): TruncatedGRMFD {
    const { minMag, maxMag, binWidth, aVal, bVal } = this.state;
    return new TruncatedGRMFD(minMag, maxMag, binWidth, aVal, bVal);
  }

  private static check(state: TruncatedGRState): void {
    if (!(state.binWidth > 0)) {
      throw new ModificationError('bin width must be positive', {
        value: state.binWidth,
      });
    }
    if (!(state.minMag >= 0)) {
      throw new ModificationError('minimum magnitude must be non-negative', {
        value: state.minMag,
      });
    }
    if (!(state.maxMag >= state.minMag + state.binWidth)) {
      throw new ModificationError(
        'maximum magnitude must be higher than minimum magnitude by bin width at least',
        { value: state.maxMag }
      );
    }
    if (!(state.bVal > 0)) {
      throw new ModificationError('b-value must be positive', {
        value: state.bVal,
      });
    }
  }
}

/**
 * Incremental distribution with explicit rates per magnitude bin
 */
export class EvenlyDiscretizedMFD implements MagnitudeFrequencyDistribution {
  readonly kind = 'evenlyDiscretized' as const;
  private _minMag: number;
  private _binWidth: number;
  private _occurrenceRates: readonly number[];

  constructor(
    minMag: number,
    binWidth: number,
    occurrenceRates: readonly number[]
  ) {
    EvenlyDiscretizedMFD.check(minMag, binWidth, occurrenceRates);
    this._minMag = minMag;
    this._binWidth = binWidth;
    this._occurrenceRates = Object.freeze([...occurrenceRates]);
  }

  get minMag(): number {
    return this._minMag;
  }
  get binWidth(): number {
    return this._binWidth;
  }
  get occurrenceRates(): readonly number[] {
    return this._occurrenceRates;
  }

  modify(modification: MfdModification): void {
    if (modification.name !== 'set_mfd') {
      throw new UnsupportedModificationError(modification.name, this.kind);
    }
    const { minMag, binWidth, occurrenceRates } = modification;
    EvenlyDiscretizedMFD.check(minMag, binWidth, occurrenceRates);
    this._minMag = minMag;
    this._binWidth = binWidth;
    this._occurrenceRates = Object.freeze([...occurrenceRates]);
  }

  getMinMaxMag(): [number, number] {
    const bins = this._occurrenceRates.length;
    return [this._minMag, this._minMag + (bins - 1) * this._binWidth];
  }

  clone(): EvenlyDiscretizedMFD {
    return new EvenlyDiscretizedMFD(
      this._minMag,
      this._binWidth,
      this._occurrenceRates
    );
  }

  private static check(
    minMag: number,
    binWidth: number,
    occurrenceRates: readonly number[]
  ): void {
    if (!(binWidth > 0)) {
      throw new ModificationError('bin width must be positive', {
        value: binWidth,
      });
    }
    if (!(minMag >= 0)) {
      throw new ModificationError('minimum magnitude must be non-negative', {
        value: minMag,
      });
    }
    if (occurrenceRates.length === 0) {
      throw new ModificationError('at least one occurrence rate is required');
    }
    if (!occurrenceRates.every((rate) => rate >= 0)) {
      throw new ModificationError('occurrence rates must be non-negative', {
        value: [...occurrenceRates],
      });
    }
  }
}
