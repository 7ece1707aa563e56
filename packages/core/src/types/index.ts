export {
  EngineError,
  LogicTreeError,
  GeometryError,
  ContractViolationError,
  CollapseNotSupportedError,
  BranchNotFoundError,
  LogicTreePathError,
  UnsupportedModificationError,
  ModificationError,
  ConfigError,
  formatLocation,
  isEngineError,
  type ErrorContext,
  type EngineErrorParams,
  type NodeLocation,
  type SerializedError,
  type UserError,
} from './errors.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type LogicTreeOptions,
  type ResolvedOptions,
  type PathPolicy,
  type WeightsOptions,
  type GuardsOptions,
  type SamplingOptions,
} from './options.js';
