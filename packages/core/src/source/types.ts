import type {
  ComplexFaultGeometry,
  SimpleFaultGeometry,
  Surface,
} from '../geo/surface.js';

/**
 * Concrete source kinds known to the source-type filter
 */
export type SourceKind =
  | 'point'
  | 'area'
  | 'simpleFault'
  | 'complexFault'
  | 'characteristicFault';

// Specialisations: an area source is a point source
const SOURCE_KIND_PARENT: Partial<Record<SourceKind, SourceKind>> = {
  area: 'point',
};

/**
 * True when `kind` is `ancestor` or one of its specialisations
 */
export function isKindOf(kind: SourceKind, ancestor: SourceKind): boolean {
  let current: SourceKind | undefined = kind;
  while (current !== undefined) {
    if (current === ancestor) return true;
    current = SOURCE_KIND_PARENT[current];
  }
  return false;
}

export type SourceModification =
  | { name: 'adjust_dip'; increment: number }
  | { name: 'set_dip'; dip: number }
  | {
      name: 'set_geometry';
      geometry: SimpleFaultGeometry | ComplexFaultGeometry | Surface;
    };

export type MfdModification =
  | { name: 'set_ab'; aVal: number; bVal: number }
  | { name: 'increment_b'; value: number }
  | { name: 'increment_max_mag'; value: number }
  | { name: 'set_max_mag'; value: number }
  | {
      name: 'set_mfd';
      minMag: number;
      binWidth: number;
      occurrenceRates: readonly number[];
    };

/**
 * Generic "modify by operation name" capability. Implementations handle the
 * modifications they support and raise UnsupportedModificationError otherwise.
 */
export interface Modifiable<M extends { name: string }> {
  modify(modification: M): void;
}

export interface MagnitudeFrequencyDistribution
  extends Modifiable<MfdModification> {
  readonly kind: string;
  getMinMaxMag(): [number, number];
  clone(): MagnitudeFrequencyDistribution;
}

/**
 * What the engine needs from a seismic source
 */
export interface SeismicSource extends Modifiable<SourceModification> {
  readonly sourceId: string;
  readonly kind: SourceKind;
  readonly tectonicRegionType: string;
  /** Weight of the source inside a collapsed fan-out (1 otherwise). */
  scalingRate: number;
  readonly mfd?: MagnitudeFrequencyDistribution;
  /** True when the rupture surface is a composite of several sub-shapes. */
  isMultiSurface(): boolean;
  /** Copy sharing nested mutable state with the original. */
  shallowCopy(): SeismicSource;
  /** Independent copy; mutating it never affects the original. */
  deepCopy(): SeismicSource;
}
