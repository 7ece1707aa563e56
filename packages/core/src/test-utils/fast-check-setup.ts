import fc from 'fast-check';

// Deterministic property runs; FC_NUM_RUNS and TEST_SEED come from vitest.config.ts
const numRuns = Number.parseInt(process.env.FC_NUM_RUNS ?? '', 10);
const seed = Number.parseInt(process.env.TEST_SEED ?? '', 10);

if (Number.isNaN(numRuns) || numRuns < 1) {
  throw new Error(`Invalid FC_NUM_RUNS: ${process.env.FC_NUM_RUNS ?? ''}`);
}

fc.configureGlobal({
  numRuns,
  ...(Number.isNaN(seed) ? {} : { seed }),
});
