#!/usr/bin/env node

// CLI entry point
// - Command name: `faultbranch` with subcommands `realizations` and `values`.
// - `realizations` loads a logic-tree document and prints every path with its
//   weight, or `--samples` seeded draws, as JSON or NDJSON.
// - `values` prints the `(branch set, value)` pairs met along one `--path`.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  EngineError,
  EnumerateRealizations,
  ErrorCode,
  ErrorPresenter,
  SampleRealizations,
  isEngineError,
  resolveOptions,
  type BsetValue,
  type LogicTreeOptions,
  type MetricsSnapshot,
  type Realization,
} from '@faultbranch/core';
import { renderCLIView } from './render.js';
import {
  parseLtPath,
  parseTreeOptions,
  resolveOutputFormat,
  resolveSampleCount,
  resolveSeed,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { printTreeDebug } from './debug.js';
import { loadTreeFile, type LoadedTree } from './tree-loader.js';

export interface ValueRecord {
  branchSet: string;
  uncertaintyType: string;
  value: unknown;
}

export interface RealizationRecord {
  ordinal: number;
  weight: number;
  path: string;
  values: ValueRecord[];
}

const program = new Command();

program
  .name('faultbranch')
  .description('Enumerate, sample and inspect seismic source logic trees')
  .version('0.1.0');

program
  .command('realizations')
  .description('List the realizations of a logic tree')
  .option('-t, --tree <file>', 'Logic tree JSON file')
  .option(
    '-n, --samples <number>',
    'Number of sampled realizations (0 enumerates every path)',
    '0'
  )
  .option('--seed <number>', 'Seed of the first sample', '42')
  .option('--path-policy <policy>', 'Leftover path ids: lenient|strict')
  .option('--max-depth <number>', 'Maximum number of tree levels')
  .option('--tolerance <number>', 'Allowed distance of weight sums from 1')
  .option('--out <format>', 'Output format: json|ndjson', 'json')
  .option('--print-metrics', 'Print metrics as JSON to stderr', false)
  .option('--debug', 'Print effective configuration and tree to stderr')
  .action(async (options: CliOptions) => {
    try {
      const { root, treeOptions } = loadTree(options);
      const samples = resolveSampleCount(options.samples);
      const seed = resolveSeed(options.seed);
      const outFormat = resolveOutputFormat(options.out);

      const result =
        samples > 0
          ? SampleRealizations(root, { ...treeOptions, samples, seed })
          : EnumerateRealizations(root, treeOptions);

      writeRecords(result.realizations.map(toRealizationRecord), outFormat);
      printMetrics(result.metrics);
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

program
  .command('values')
  .description('Print the uncertainty values met along a path')
  .option('-t, --tree <file>', 'Logic tree JSON file')
  .option('-p, --path <ids>', 'Branch ids separated by ~ or ,')
  .option('--path-policy <policy>', 'Leftover path ids: lenient|strict')
  .option('--max-depth <number>', 'Maximum number of tree levels')
  .option('--tolerance <number>', 'Allowed distance of weight sums from 1')
  .option('--out <format>', 'Output format: json|ndjson', 'json')
  .option('--debug', 'Print effective configuration and tree to stderr')
  .action(async (options: CliOptions) => {
    try {
      const { root, treeOptions } = loadTree(options);
      const ltPath = parseLtPath(options.path);
      const outFormat = resolveOutputFormat(options.out);

      const bsetValues = root.getBsetValues(ltPath, treeOptions);
      if (bsetValues.length < ltPath.length) {
        process.stderr.write(
          `[faultbranch] path ids not consumed: ${ltPath.slice(bsetValues.length).join(', ')}\n`
        );
      }
      writeRecords(bsetValues.map(toValueRecord), outFormat);
    } catch (err: unknown) {
      await handleCliError(err);
    }
  });

interface CommandTree extends LoadedTree {
  treeOptions: LogicTreeOptions;
}

function loadTree(options: CliOptions): CommandTree {
  if (!options.tree) throw new ConfigError('Missing --tree <file>', 'tree');
  const treeOptions = parseTreeOptions(options);
  const resolved = resolveOptions(treeOptions);
  const loaded = loadTreeFile(options.tree, treeOptions);
  if (options.debug) {
    printTreeDebug(loaded.root, resolved);
  }
  return { ...loaded, treeOptions };
}

export function toValueRecord([bset, value]: BsetValue): ValueRecord {
  return {
    branchSet: bset.id,
    uncertaintyType: bset.uncertaintyType,
    value,
  };
}

export function toRealizationRecord(
  realization: Realization
): RealizationRecord {
  return {
    ordinal: realization.ordinal,
    weight: realization.weight,
    path: realization.ltPath.join('~'),
    values: realization.values.map(toValueRecord),
  };
}

export function formatRecords(
  records: readonly unknown[],
  outFormat: OutputFormat
): string {
  if (outFormat === 'ndjson') {
    const lines = records.map((record) => JSON.stringify(record ?? null));
    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }
  return JSON.stringify(records, null, 2) + '\n';
}

function writeRecords(
  records: readonly unknown[],
  outFormat: OutputFormat
): void {
  const text = formatRecords(records, outFormat);
  if (text) process.stdout.write(text);
}

function printMetrics(metrics: MetricsSnapshot | undefined): void {
  if (metrics) {
    process.stderr.write(`[faultbranch] metrics: ${JSON.stringify(metrics)}\n`);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: EngineError;
  if (isEngineError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends EngineError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
