/**
 * Configuration options for the logic-tree engine
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';

/**
 * What `getBsetValues` does with path ids left over once a chosen branch has
 * no child branch set
 */
export type PathPolicy = 'lenient' | 'strict';

/**
 * Branch weight checks
 */
export interface WeightsOptions {
  /** Allowed distance of a weight sum from 1.0 (default: 1e-9) */
  tolerance?: number;
}

/**
 * Safety guards against runaway trees
 */
export interface GuardsOptions {
  /** Maximum number of levels walked by enumeration and sampling (default: 256) */
  maxDepth?: number;
}

export interface SamplingOptions {
  /** Label folded into every generator seed (default: 'logic-tree') */
  stream?: string;
}

export interface LogicTreeOptions {
  /** Leftover path ids handling (default: 'lenient') */
  pathPolicy?: PathPolicy;
  weights?: WeightsOptions;
  guards?: GuardsOptions;
  sampling?: SamplingOptions;
  /** Collect timers and counters in the facades (default: false) */
  metrics?: boolean;
}

export interface ResolvedOptions {
  pathPolicy: PathPolicy;
  weights: Required<WeightsOptions>;
  guards: Required<GuardsOptions>;
  sampling: Required<SamplingOptions>;
  metrics: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  pathPolicy: 'lenient',
  weights: {
    tolerance: 1e-9,
  },
  guards: {
    maxDepth: 256,
  },
  sampling: {
    stream: 'logic-tree',
  },
  metrics: false,
};

/**
 * Resolves partial user options into complete configuration
 *
 * @throws {ConfigError} When an option is out of range
 */
export function resolveOptions(
  userOptions: LogicTreeOptions = {}
): ResolvedOptions {
  // Per key, so an explicit `undefined` keeps the default
  const resolved: ResolvedOptions = {
    pathPolicy: userOptions.pathPolicy ?? DEFAULT_OPTIONS.pathPolicy,
    weights: {
      tolerance:
        userOptions.weights?.tolerance ?? DEFAULT_OPTIONS.weights.tolerance,
    },
    guards: {
      maxDepth: userOptions.guards?.maxDepth ?? DEFAULT_OPTIONS.guards.maxDepth,
    },
    sampling: {
      stream: userOptions.sampling?.stream ?? DEFAULT_OPTIONS.sampling.stream,
    },
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  if (options.pathPolicy !== 'lenient' && options.pathPolicy !== 'strict') {
    throw new ConfigError(
      "pathPolicy must be 'lenient' or 'strict'",
      'pathPolicy'
    );
  }

  const { tolerance } = options.weights;
  if (!Number.isFinite(tolerance) || tolerance <= 0 || tolerance >= 0.1) {
    throw new ConfigError(
      'weights.tolerance must be a finite number in (0, 0.1)',
      'weights.tolerance'
    );
  }

  const { maxDepth } = options.guards;
  if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
    throw new ConfigError(
      'guards.maxDepth must be a positive integer',
      'guards.maxDepth'
    );
  }

  if (
    typeof options.sampling.stream !== 'string' ||
    options.sampling.stream === ''
  ) {
    throw new ConfigError(
      'sampling.stream must be a non-empty string',
      'sampling.stream'
    );
  }

  if (typeof options.metrics !== 'boolean') {
    throw new ConfigError('metrics must be boolean', 'metrics');
  }
}
