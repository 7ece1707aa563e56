/**
 * Applies the `(branchSet, value)` pairs of one logic-tree path to a source
 * group. The input group and its sources are never mutated.
 */

import { SourceGroup } from '../source/source-group.js';
import type { SeismicSource } from '../source/types.js';
import type { BsetValue } from '../tree/branch-set.js';
import { CollapseNotSupportedError } from '../types/errors.js';
import { applyUncertainty } from '../uncertainty/apply.js';
import type { MetricsCollector } from '../util/metrics.js';

export interface ApplyUncertaintiesOptions {
  metrics?: MetricsCollector;
}

export interface TransformResult {
  group: SourceGroup;
  /** Ids of the sources no pair applied to */
  untouched: string[];
}

function transformSource(
  source: SeismicSource,
  bsetValues: readonly BsetValue[],
  applicable: readonly boolean[]
): { sources: SeismicSource[]; changes: number } {
  const working = source.deepCopy();
  const sources: SeismicSource[] = [];
  let changes = 0;

  for (const [index, [bset, value]] of bsetValues.entries()) {
    if (!applicable[index]) continue;

    if (bset.collapsed) {
      if (working.isMultiSurface()) {
        throw new CollapseNotSupportedError(String(working), {
          sourceId: working.sourceId,
          uncertaintyType: bset.uncertaintyType,
        });
      }
      for (const branch of bset.branches) {
        const fanned = working.deepCopy();
        fanned.scalingRate = branch.weight;
        applyUncertainty(bset.uncertaintyType, fanned, branch.value);
        sources.push(fanned);
      }
      changes += bset.branches.length;
      continue;
    }

    // Only the first applicable pair seeds the output with the working copy
    if (sources.length === 0) sources.push(working);
    applyUncertainty(bset.uncertaintyType, working, value);
    changes += 1;
  }
  return { sources, changes };
}

export function transformGroup(
  bsetValues: readonly BsetValue[],
  group: SourceGroup,
  options: ApplyUncertaintiesOptions = {}
): TransformResult {
  const { metrics } = options;
  const sources: SeismicSource[] = [];
  const untouched: string[] = [];
  let changes = 0;

  for (const source of group) {
    metrics?.add('sourcesVisited');
    const applicable = bsetValues.map(([bset]) => bset.filterSource(source));

    if (!applicable.includes(true)) {
      untouched.push(source.sourceId);
      sources.push(source.shallowCopy());
      continue;
    }

    const result = transformSource(source, bsetValues, applicable);
    metrics?.add('sourcesChanged');
    metrics?.add('collapsedFanOut', countFanOut(bsetValues, applicable));
    sources.push(...result.sources);
    changes += result.changes;
  }

  return { group: group.withSources(sources, changes), untouched };
}

function countFanOut(
  bsetValues: readonly BsetValue[],
  applicable: readonly boolean[]
): number {
  let count = 0;
  for (const [index, [bset]] of bsetValues.entries()) {
    if (applicable[index] && bset.collapsed) count += bset.branches.length;
  }
  return count;
}

/**
 * New group whose sources reflect every applicable uncertainty of the path.
 * Untouched sources are shallow copies; changed ones are deep copies, and a
 * collapsed set fans a source out into one copy per branch weighted by
 * `scalingRate`.
 *
 * @throws {CollapseNotSupportedError} When a collapsed set applies to a
 * multi-surface source
 */
export function applyUncertainties(
  bsetValues: readonly BsetValue[],
  group: SourceGroup,
  options: ApplyUncertaintiesOptions = {}
): SourceGroup {
  return transformGroup(bsetValues, group, options).group;
}
