import {
  ConfigError,
  DEFAULT_RANDOM_SEED,
  type LogicTreeOptions,
  type PathPolicy,
} from '@faultbranch/core';

export type OutputFormat = 'json' | 'ndjson';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  tree?: string;
  samples?: string | number;
  seed?: string | number;
  out?: string;
  path?: string;
  pathPolicy?: string;
  maxDepth?: string | number;
  tolerance?: string | number;
  printMetrics?: boolean;
  debug?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || String(value).trim() === '';
}

function parseNumber(name: string, value: unknown): number {
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (isBlank(value) || !Number.isFinite(num)) {
    throw new ConfigError(
      `Invalid --${name} value "${String(value)}". Expected a number.`,
      name
    );
  }
  return num;
}

function parseInteger(name: string, value: unknown): number {
  const num = parseNumber(name, value);
  if (!Number.isInteger(num)) {
    throw new ConfigError(
      `Invalid --${name} value "${String(value)}". Expected an integer.`,
      name
    );
  }
  return num;
}

/**
 * Parse CLI options into LogicTreeOptions. Ranges are checked later by
 * `resolveOptions`.
 */
export function parseTreeOptions(options: CliOptions): LogicTreeOptions {
  const treeOptions: LogicTreeOptions = {};

  if (!isBlank(options.pathPolicy)) {
    treeOptions.pathPolicy = resolvePathPolicy(options.pathPolicy);
  }
  if (!isBlank(options.maxDepth)) {
    treeOptions.guards = {
      maxDepth: parseInteger('max-depth', options.maxDepth),
    };
  }
  if (!isBlank(options.tolerance)) {
    treeOptions.weights = {
      tolerance: parseNumber('tolerance', options.tolerance),
    };
  }
  if (options.printMetrics === true) {
    treeOptions.metrics = true;
  }

  return treeOptions;
}

/**
 * Number of sampled realizations; 0 (the default) enumerates every path.
 */
export function resolveSampleCount(value: unknown): number {
  if (isBlank(value)) return 0;
  const count = parseInteger('samples', value);
  if (count < 0) {
    throw new ConfigError(
      `Invalid --samples value "${String(value)}". Expected a non-negative integer.`,
      'samples'
    );
  }
  return count;
}

export function resolveSeed(value: unknown): number {
  return isBlank(value) ? DEFAULT_RANDOM_SEED : parseInteger('seed', value);
}

export function resolvePathPolicy(value: unknown): PathPolicy {
  const raw = String(value).toLowerCase();
  if (raw === 'lenient' || raw === 'strict') {
    return raw;
  }
  throw new ConfigError(
    `Invalid --path-policy value "${String(value)}". Expected "lenient" or "strict".`,
    'pathPolicy'
  );
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (isBlank(value)) {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw new ConfigError(
    `Invalid --out value "${String(
      value
    )}". Supported formats are "json" and "ndjson".`,
    'out'
  );
}

/**
 * Branch ids of a path, separated by `~` or `,` (`b1~c2` or `b1,c2`)
 */
export function parseLtPath(value: unknown): string[] {
  const ids = isBlank(value)
    ? []
    : String(value)
        .split(/[~,]/)
        .map((id) => id.trim())
        .filter((id) => id !== '');
  if (ids.length === 0) {
    throw new ConfigError('Missing --path <ids>', 'path');
  }
  return ids;
}
