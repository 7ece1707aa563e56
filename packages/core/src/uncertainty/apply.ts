import type { SeismicSource } from '../source/types.js';
import { ContractViolationError } from '../types/errors.js';
import { UNCERTAINTY_HANDLERS, type UncertaintyHandler } from './handlers.js';
import { isUncertaintyType, type UncertaintyValue } from './types.js';

/**
 * Apply a parsed uncertainty value to `source` (or its MFD) in place.
 *
 * Unknown tags, tags that do not act on sources and values of the wrong
 * shape are contract violations.
 */
export function applyUncertainty(
  uncertaintyType: string,
  source: SeismicSource,
  value: UncertaintyValue
): void {
  if (!isUncertaintyType(uncertaintyType)) {
    throw new ContractViolationError(
      `unknown uncertainty type '${uncertaintyType}'`,
      { uncertaintyType }
    );
  }
  const handler: UncertaintyHandler = UNCERTAINTY_HANDLERS[uncertaintyType];
  if (!handler.apply) {
    throw new ContractViolationError(
      `uncertainty '${uncertaintyType}' does not apply to sources`,
      { uncertaintyType, sourceId: source.sourceId }
    );
  }
  handler.apply(source, value);
}

/**
 * False for tags that select a model file instead of modifying sources
 */
export function appliesToSources(uncertaintyType: string): boolean {
  if (!isUncertaintyType(uncertaintyType)) return false;
  const handler: UncertaintyHandler = UNCERTAINTY_HANDLERS[uncertaintyType];
  return handler.apply !== undefined;
}
