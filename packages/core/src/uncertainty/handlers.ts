/**
 * Static dispatch table: each uncertainty tag carries its parser and, for the
 * tags that act on sources, the modification it applies. Tags missing from
 * the table parse with the single-float default entry.
 */

import {
  parseCharacteristicSurface,
  parseComplexFaultGeometry,
  parseSimpleFaultGeometry,
} from '../parser/geometry.js';
import {
  attrFloat,
  findChild,
  localName,
  toFloat,
  toFloatList,
  type UncertaintyNode,
} from '../parser/node.js';
import type {
  MagnitudeFrequencyDistribution,
  SeismicSource,
} from '../source/types.js';
import type {
  ComplexFaultGeometry,
  SimpleFaultGeometry,
  Surface,
} from '../geo/surface.js';
import { ContractViolationError, LogicTreeError } from '../types/errors.js';
import type {
  IncrementalMFDValue,
  UncertaintyType,
  UncertaintyValue,
} from './types.js';

export interface UncertaintyHandler {
  parse(node: UncertaintyNode, filename: string): UncertaintyValue;
  /** Absent for tags that select models rather than modify sources. */
  apply?: (source: SeismicSource, value: UncertaintyValue) => void;
}

interface HandlerDef<T extends UncertaintyValue> {
  parse(node: UncertaintyNode, filename: string): T;
  accepts(value: UncertaintyValue): value is T;
  apply?: (source: SeismicSource, value: T) => void;
}

function describeValue(value: UncertaintyValue): string {
  if (typeof value === 'object' && 'kind' in value) return value.kind;
  return JSON.stringify(value);
}

function defineHandler<T extends UncertaintyValue>(
  type: UncertaintyType,
  def: HandlerDef<T>
): UncertaintyHandler {
  const { apply } = def;
  return {
    parse: def.parse,
    apply:
      apply &&
      ((source, value) => {
        if (!def.accepts(value)) {
          throw new ContractViolationError(
            `value ${describeValue(value)} does not fit uncertainty '${type}'`,
            { uncertaintyType: type, sourceId: source.sourceId }
          );
        }
        apply(source, value);
      }),
  };
}

function mfdOf(
  source: SeismicSource,
  type: UncertaintyType
): MagnitudeFrequencyDistribution {
  if (!source.mfd) {
    throw new ContractViolationError(
      `source '${source.sourceId}' has no MFD for uncertainty '${type}'`,
      { uncertaintyType: type, sourceId: source.sourceId }
    );
  }
  return source.mfd;
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export function parseSingleFloat(
  node: UncertaintyNode,
  filename: string
): number {
  const value = toFloat(node.text);
  if (value === undefined) {
    throw new LogicTreeError(node, filename, 'expected single float value');
  }
  return value;
}

function parseModelReference(node: UncertaintyNode, filename: string): string {
  const text = node.text?.trim() ?? '';
  if (text === '') {
    throw new LogicTreeError(node, filename, 'expected a model reference');
  }
  return text;
}

function parseABPair(
  node: UncertaintyNode,
  filename: string
): readonly [number, number] {
  const values = toFloatList(node.text);
  const [a, b] = values ?? [];
  if (values?.length !== 2 || a === undefined || b === undefined) {
    throw new LogicTreeError(
      node,
      filename,
      'expected a pair of floats separated by space'
    );
  }
  return [a, b];
}

function parseIncrementalMFD(
  node: UncertaintyNode,
  filename: string
): IncrementalMFDValue {
  const mfdNode =
    localName(node.tag) === 'incrementalMFD'
      ? node
      : findChild(node, 'incrementalMFD');
  if (!mfdNode) {
    throw new LogicTreeError(node, filename, "missing 'incrementalMFD' node");
  }
  const minMag = attrFloat(mfdNode, 'minMag');
  const binWidth = attrFloat(mfdNode, 'binWidth');
  const occurrenceRates = toFloatList(findChild(mfdNode, 'occurRates')?.text);
  if (
    minMag === undefined ||
    binWidth === undefined ||
    occurrenceRates === undefined ||
    occurrenceRates.length === 0
  ) {
    throw new LogicTreeError(
      mfdNode,
      filename,
      "'incrementalMFD' node is not valid"
    );
  }
  return { minMag, binWidth, occurrenceRates };
}

// ---------------------------------------------------------------------------
// Value guards
// ---------------------------------------------------------------------------

const SURFACE_KINDS: ReadonlySet<string> = new Set([
  'simpleFaultSurface',
  'complexFaultSurface',
  'planarSurface',
  'multiSurface',
]);

const isString = (value: UncertaintyValue): value is string =>
  typeof value === 'string';

const isNumber = (value: UncertaintyValue): value is number =>
  typeof value === 'number';

const isPair = (
  value: UncertaintyValue
): value is readonly [number, number] => {
  if (typeof value !== 'object' || !('length' in value)) return false;
  return (
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
};

const isIncrementalMFD = (
  value: UncertaintyValue
): value is IncrementalMFDValue =>
  typeof value === 'object' && 'occurrenceRates' in value;

const isSimpleFaultGeometry = (
  value: UncertaintyValue
): value is SimpleFaultGeometry =>
  typeof value === 'object' && 'kind' in value && value.kind === 'simpleFault';

const isComplexFaultGeometry = (
  value: UncertaintyValue
): value is ComplexFaultGeometry =>
  typeof value === 'object' &&
  'kind' in value &&
  value.kind === 'complexFault';

const isSurface = (value: UncertaintyValue): value is Surface =>
  typeof value === 'object' && 'kind' in value && SURFACE_KINDS.has(value.kind);

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export const UNCERTAINTY_HANDLERS = {
  sourceModel: defineHandler('sourceModel', {
    parse: parseModelReference,
    accepts: isString,
  }),
  extendModel: defineHandler('extendModel', {
    parse: parseModelReference,
    accepts: isString,
  }),
  gmpeModel: defineHandler('gmpeModel', {
    parse: parseModelReference,
    accepts: isString,
  }),
  maxMagGRRelative: defineHandler('maxMagGRRelative', {
    parse: parseSingleFloat,
    accepts: isNumber,
    apply: (source, value) =>
      mfdOf(source, 'maxMagGRRelative').modify({
        name: 'increment_max_mag',
        value,
      }),
  }),
  bGRRelative: defineHandler('bGRRelative', {
    parse: parseSingleFloat,
    accepts: isNumber,
    apply: (source, value) =>
      mfdOf(source, 'bGRRelative').modify({ name: 'increment_b', value }),
  }),
  maxMagGRAbsolute: defineHandler('maxMagGRAbsolute', {
    parse: parseSingleFloat,
    accepts: isNumber,
    apply: (source, value) =>
      mfdOf(source, 'maxMagGRAbsolute').modify({ name: 'set_max_mag', value }),
  }),
  abGRAbsolute: defineHandler('abGRAbsolute', {
    parse: parseABPair,
    accepts: isPair,
    apply: (source, [aVal, bVal]) =>
      mfdOf(source, 'abGRAbsolute').modify({ name: 'set_ab', aVal, bVal }),
  }),
  incrementalMFDAbsolute: defineHandler('incrementalMFDAbsolute', {
    parse: parseIncrementalMFD,
    accepts: isIncrementalMFD,
    apply: (source, { minMag, binWidth, occurrenceRates }) =>
      mfdOf(source, 'incrementalMFDAbsolute').modify({
        name: 'set_mfd',
        minMag,
        binWidth,
        occurrenceRates,
      }),
  }),
  simpleFaultDipRelative: defineHandler('simpleFaultDipRelative', {
    parse: parseSingleFloat,
    accepts: isNumber,
    apply: (source, increment) =>
      source.modify({ name: 'adjust_dip', increment }),
  }),
  simpleFaultDipAbsolute: defineHandler('simpleFaultDipAbsolute', {
    parse: parseSingleFloat,
    accepts: isNumber,
    apply: (source, dip) => source.modify({ name: 'set_dip', dip }),
  }),
  simpleFaultGeometryAbsolute: defineHandler('simpleFaultGeometryAbsolute', {
    parse: parseSimpleFaultGeometry,
    accepts: isSimpleFaultGeometry,
    apply: (source, geometry) =>
      source.modify({ name: 'set_geometry', geometry }),
  }),
  complexFaultGeometryAbsolute: defineHandler('complexFaultGeometryAbsolute', {
    parse: parseComplexFaultGeometry,
    accepts: isComplexFaultGeometry,
    apply: (source, geometry) =>
      source.modify({ name: 'set_geometry', geometry }),
  }),
  characteristicFaultGeometryAbsolute: defineHandler(
    'characteristicFaultGeometryAbsolute',
    {
      parse: parseCharacteristicSurface,
      accepts: isSurface,
      apply: (source, geometry) =>
        source.modify({ name: 'set_geometry', geometry }),
    }
  ),
} satisfies Record<UncertaintyType, UncertaintyHandler>;

/** Default entry for tags outside the table. */
export const UNKNOWN_UNCERTAINTY: UncertaintyHandler = {
  parse: parseSingleFloat,
};
