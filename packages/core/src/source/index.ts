export {
  isKindOf,
  type SourceKind,
  type SourceModification,
  type MfdModification,
  type Modifiable,
  type MagnitudeFrequencyDistribution,
  type SeismicSource,
} from './types.js';
export { TruncatedGRMFD, EvenlyDiscretizedMFD } from './mfd.js';
export {
  BaseSource,
  PointSource,
  AreaSource,
  SimpleFaultSource,
  ComplexFaultSource,
  CharacteristicFaultSource,
  type SourceInit,
} from './sources.js';
export { SourceGroup } from './source-group.js';
