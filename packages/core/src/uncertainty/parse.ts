import type { UncertaintyNode } from '../parser/node.js';
import { UNCERTAINTY_HANDLERS, UNKNOWN_UNCERTAINTY } from './handlers.js';
import { isUncertaintyType, type UncertaintyValue } from './types.js';

/**
 * Parse the raw value of an `uncertaintyModel` node for the given tag.
 *
 * Unknown tags fall back to a single float literal. Malformed values raise a
 * LogicTreeError located at the offending node of `filename`.
 */
export function parseUncertainty(
  uncertaintyType: string,
  node: UncertaintyNode,
  filename: string
): UncertaintyValue {
  const handler = isUncertaintyType(uncertaintyType)
    ? UNCERTAINTY_HANDLERS[uncertaintyType]
    : UNKNOWN_UNCERTAINTY;
  return handler.parse(node, filename);
}
