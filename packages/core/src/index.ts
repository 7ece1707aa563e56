// Logic-tree engine entry point
//
// - High-level facades Realize/EnumerateRealizations/SampleRealizations via ./api.js.
// - Low-level building blocks: the branch/branch-set tree, enumeration, sampling,
//   applyUncertainties, the uncertainty dispatch table and the reference source model.

export * from './api.js';

export * from './types/index.js';

// Tree
export * from './tree/index.js';
export {
  sample,
  sampleBranches,
  weightOf,
  cumulativeWeights,
  drawIndex,
  type Weighted,
} from './sampling/sample.js';
export {
  applyUncertainties,
  transformGroup,
  type ApplyUncertaintiesOptions,
  type TransformResult,
} from './transform/apply-uncertainties.js';
export {
  realizations,
  pathValues,
  DEFAULT_RANDOM_SEED,
  type Realization,
  type RealizationOptions,
} from './realizations.js';

// Uncertainties
export * from './uncertainty/index.js';
export * from './parser/index.js';

// Source model
export * from './source/index.js';
export * from './geo/index.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Diagnostics & metrics
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
export {
  DIAGNOSTIC_CODES,
  makeDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticDetailsMap,
} from './diag/codes.js';

export { XorShift32, fnv1a32, mix32 } from './util/rng.js';
