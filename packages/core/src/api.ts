// NOTE: The README "Node.js API" section documents Realize/EnumerateRealizations/
// SampleRealizations. Keep it in sync with any change to their signatures or defaults.

import {
  DIAGNOSTIC_CODES,
  makeDiagnostic,
  type Diagnostic,
} from './diag/codes.js';
import {
  realizations,
  type Realization,
  type RealizationOptions,
} from './realizations.js';
import type { SourceGroup } from './source/source-group.js';
import { transformGroup } from './transform/apply-uncertainties.js';
import { appliesToSources } from './uncertainty/apply.js';
import type { BranchSet, BsetValue } from './tree/branch-set.js';
import { ConfigError } from './types/errors.js';
import { resolveOptions, type LogicTreeOptions } from './types/options.js';
import { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';

export interface RealizeResult {
  /** New group; the input group is left as it was */
  group: SourceGroup;
  bsetValues: BsetValue[];
  diagnostics: Diagnostic[];
  /** Present when `metrics: true` */
  metrics?: MetricsSnapshot;
}

export interface RealizationsResult {
  realizations: Realization[];
  /** Present when `metrics: true` */
  metrics?: MetricsSnapshot;
}

function createCollector(enabled: boolean): MetricsCollector | undefined {
  return enabled ? new MetricsCollector() : undefined;
}

/**
 * Applies the path `ltPath` of the tree below `root` to `group`. Levels
 * that only select a model file (`sourceModel`, `extendModel`, `gmpeModel`)
 * are returned in `bsetValues` but not applied.
 */
export function Realize(
  root: BranchSet,
  ltPath: readonly string[],
  group: SourceGroup,
  options: LogicTreeOptions = {}
): RealizeResult {
  const resolved = resolveOptions(options);
  const metrics = createCollector(resolved.metrics);
  const diagnostics: Diagnostic[] = [];

  const bsetValues = root.getBsetValues(ltPath, resolved);
  if (bsetValues.length < ltPath.length) {
    diagnostics.push(
      makeDiagnostic(DIAGNOSTIC_CODES.LT_PATH_TRUNCATED, {
        consumed: ltPath.slice(0, bsetValues.length),
        unconsumed: ltPath.slice(bsetValues.length),
      })
    );
  }

  const applicable = bsetValues.filter(([bset]) =>
    appliesToSources(bset.uncertaintyType)
  );
  const run = (): ReturnType<typeof transformGroup> =>
    transformGroup(applicable, group, { metrics });
  const { group: transformed, untouched } = metrics
    ? metrics.time('APPLY', run)
    : run();
  if (untouched.length > 0) {
    diagnostics.push(
      makeDiagnostic(DIAGNOSTIC_CODES.SOURCE_UNTOUCHED, {
        count: untouched.length,
        sourceIds: untouched,
      })
    );
  }

  return {
    group: transformed,
    bsetValues,
    diagnostics,
    metrics: metrics?.snapshotMetrics(),
  };
}

/**
 * Every path of the tree, weighted by its path weight
 */
export function EnumerateRealizations(
  root: BranchSet,
  options: LogicTreeOptions = {}
): RealizationsResult {
  const metrics = createCollector(resolveOptions(options).metrics);
  const collect = (): Realization[] => [
    ...realizations(root, { ...options, numberOfLogicTreeSamples: 0 }),
  ];
  const result = metrics ? metrics.time('ENUMERATE', collect) : collect();
  metrics?.add('pathsEnumerated', result.length);
  return { realizations: result, metrics: metrics?.snapshotMetrics() };
}

export interface SampleRealizationsOptions extends LogicTreeOptions {
  samples: number;
  /** Default: 42 */
  seed?: number;
}

/**
 * `samples` seeded draws, each weighted `1 / samples`
 */
export function SampleRealizations(
  root: BranchSet,
  options: SampleRealizationsOptions
): RealizationsResult {
  const { samples, seed, ...treeOptions } = options;
  if (!Number.isInteger(samples) || samples <= 0) {
    throw new ConfigError('samples must be a positive integer', 'samples');
  }
  const metrics = createCollector(resolveOptions(treeOptions).metrics);
  const realizationOptions: RealizationOptions = {
    ...treeOptions,
    numberOfLogicTreeSamples: samples,
    randomSeed: seed,
  };
  const collect = (): Realization[] => [
    ...realizations(root, realizationOptions),
  ];
  const result = metrics ? metrics.time('SAMPLE', collect) : collect();
  metrics?.add('samplesDrawn', result.length);
  return { realizations: result, metrics: metrics?.snapshotMetrics() };
}
