/**
 * Parser module exports
 */

export {
  localName,
  childNodes,
  findChild,
  requireChild,
  toFloat,
  toFloatList,
  attrFloat,
  childFloat,
  type UncertaintyNode,
} from './node.js';
export {
  parseSimpleFaultGeometry,
  parseComplexFaultGeometry,
  parsePlanarSurface,
  parseCharacteristicSurface,
} from './geometry.js';
