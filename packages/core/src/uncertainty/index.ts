export {
  UNCERTAINTY_TYPES,
  isUncertaintyType,
  type UncertaintyType,
  type UncertaintyValue,
  type UncertaintyValueMap,
  type IncrementalMFDValue,
} from './types.js';
export {
  UNCERTAINTY_HANDLERS,
  UNKNOWN_UNCERTAINTY,
  parseSingleFloat,
  type UncertaintyHandler,
} from './handlers.js';
export { parseUncertainty } from './parse.js';
export { applyUncertainty, appliesToSources } from './apply.js';
