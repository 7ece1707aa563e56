/**
 * Applicability filters of a branch set. All filters present must pass.
 */

import { isKindOf, type SeismicSource, type SourceKind } from '../source/types.js';
import { ContractViolationError } from '../types/errors.js';

export interface BranchSetFilters {
  /** Exact match on the source's tectonic region type */
  applyToTectonicRegionType?: string;
  /** One of point, area, simpleFault, complexFault, characteristicFault */
  applyToSourceType?: string;
  /** Source ids the branch set applies to */
  applyToSources?: readonly string[];
}

export const FILTER_KEYS = [
  'applyToTectonicRegionType',
  'applyToSourceType',
  'applyToSources',
] as const;

export type FilterKey = (typeof FILTER_KEYS)[number];

const KNOWN_FILTERS: ReadonlySet<string> = new Set(FILTER_KEYS);

// A point filter selects plain point sources, not their area specialisation
const SOURCE_TYPE_MATCHERS: ReadonlyMap<string, (kind: SourceKind) => boolean> =
  new Map([
    ['point', (kind) => isKindOf(kind, 'point') && !isKindOf(kind, 'area')],
    ['area', (kind) => isKindOf(kind, 'area')],
    ['simpleFault', (kind) => isKindOf(kind, 'simpleFault')],
    ['complexFault', (kind) => isKindOf(kind, 'complexFault')],
    ['characteristicFault', (kind) => isKindOf(kind, 'characteristicFault')],
  ]);

function sourceTypeMatcher(sourceType: string): (kind: SourceKind) => boolean {
  const matcher = SOURCE_TYPE_MATCHERS.get(sourceType);
  if (!matcher) {
    throw new ContractViolationError(`unknown source type '${sourceType}'`, {
      filter: 'applyToSourceType',
      value: sourceType,
    });
  }
  return matcher;
}

/**
 * Rejects unknown filter keys and source types up front.
 * Filters arriving from untyped input may carry arbitrary keys.
 */
export function checkFilters(filters: BranchSetFilters): void {
  for (const key of Object.keys(filters)) {
    if (!KNOWN_FILTERS.has(key)) {
      throw new ContractViolationError(`unknown filter '${key}'`, {
        filter: key,
      });
    }
  }
  if (filters.applyToSourceType !== undefined) {
    sourceTypeMatcher(filters.applyToSourceType);
  }
}

/**
 * True when every filter present accepts `source`. An absent source fails
 * every filter; an empty filter map accepts anything.
 */
export function filterSource(
  filters: BranchSetFilters,
  source: SeismicSource | undefined
): boolean {
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    switch (key) {
      case 'applyToTectonicRegionType':
        if (source?.tectonicRegionType !== value) return false;
        break;
      case 'applyToSourceType': {
        const matches = sourceTypeMatcher(String(value));
        if (!source || !matches(source.kind)) return false;
        break;
      }
      case 'applyToSources':
        if (!source || !filters.applyToSources?.includes(source.sourceId)) {
          return false;
        }
        break;
      default:
        throw new ContractViolationError(`unknown filter '${key}'`, {
          filter: key,
        });
    }
  }
  return true;
}
