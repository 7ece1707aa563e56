import type {
  ComplexFaultGeometry,
  SimpleFaultGeometry,
  Surface,
} from '../geo/surface.js';

/**
 * Closed set of uncertainty tags a branch set may carry
 */
export const UNCERTAINTY_TYPES = [
  'sourceModel',
  'extendModel',
  'gmpeModel',
  'maxMagGRRelative',
  'bGRRelative',
  'maxMagGRAbsolute',
  'abGRAbsolute',
  'incrementalMFDAbsolute',
  'simpleFaultDipRelative',
  'simpleFaultDipAbsolute',
  'simpleFaultGeometryAbsolute',
  'complexFaultGeometryAbsolute',
  'characteristicFaultGeometryAbsolute',
] as const;

export type UncertaintyType = (typeof UNCERTAINTY_TYPES)[number];

const KNOWN_TYPES: ReadonlySet<string> = new Set(UNCERTAINTY_TYPES);

export function isUncertaintyType(value: string): value is UncertaintyType {
  return KNOWN_TYPES.has(value);
}

export interface IncrementalMFDValue {
  readonly minMag: number;
  readonly binWidth: number;
  readonly occurrenceRates: readonly number[];
}

/**
 * Parsed value carried by a branch, per uncertainty tag
 */
export interface UncertaintyValueMap {
  sourceModel: string;
  extendModel: string;
  gmpeModel: string;
  maxMagGRRelative: number;
  bGRRelative: number;
  maxMagGRAbsolute: number;
  abGRAbsolute: readonly [number, number];
  incrementalMFDAbsolute: IncrementalMFDValue;
  simpleFaultDipRelative: number;
  simpleFaultDipAbsolute: number;
  simpleFaultGeometryAbsolute: SimpleFaultGeometry;
  complexFaultGeometryAbsolute: ComplexFaultGeometry;
  characteristicFaultGeometryAbsolute: Surface;
}

export type UncertaintyValue = UncertaintyValueMap[UncertaintyType];
