export { Point, EARTH_RADIUS } from './point.js';
export { Line } from './line.js';
export {
  SimpleFaultSurface,
  ComplexFaultSurface,
  PlanarSurface,
  MultiSurface,
  isMultiSurface,
  type SimpleFaultGeometry,
  type ComplexFaultGeometry,
  type SingleSurface,
  type Surface,
} from './surface.js';
