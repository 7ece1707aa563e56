import type { Point } from '../geo/point.js';
import type {
  ComplexFaultGeometry,
  SimpleFaultGeometry,
  Surface,
} from '../geo/surface.js';
import {
  GeometryError,
  ModificationError,
  UnsupportedModificationError,
} from '../types/errors.js';
import type {
  MagnitudeFrequencyDistribution,
  SeismicSource,
  SourceKind,
  SourceModification,
} from './types.js';

export interface SourceInit {
  sourceId: string;
  name: string;
  tectonicRegionType: string;
  mfd: MagnitudeFrequencyDistribution;
}

/**
 * Shared behaviour of the in-memory source model. Geometry values are
 * immutable, so copies only need fresh MFDs and fresh scalar fields.
 */
export abstract class BaseSource implements SeismicSource {
  abstract readonly kind: SourceKind;
  public readonly sourceId: string;
  public readonly name: string;
  public readonly tectonicRegionType: string;
  public scalingRate = 1;
  protected _mfd: MagnitudeFrequencyDistribution;

  constructor(init: SourceInit) {
    this.sourceId = init.sourceId;
    this.name = init.name;
    this.tectonicRegionType = init.tectonicRegionType;
    this._mfd = init.mfd;
  }

  get mfd(): MagnitudeFrequencyDistribution {
    return this._mfd;
  }

  /** New instance of the concrete class with the same geometry and `mfd`. */
  protected abstract duplicate(mfd: MagnitudeFrequencyDistribution): BaseSource;

  shallowCopy(): BaseSource {
    const copy = this.duplicate(this._mfd);
    copy.scalingRate = this.scalingRate;
    return copy;
  }

  deepCopy(): BaseSource {
    const copy = this.duplicate(this._mfd.clone());
    copy.scalingRate = this.scalingRate;
    return copy;
  }

  isMultiSurface(): boolean {
    return false;
  }

  modify(modification: SourceModification): void {
    throw new UnsupportedModificationError(modification.name, this.toString());
  }

  protected init(): SourceInit {
    return {
      sourceId: this.sourceId,
      name: this.name,
      tectonicRegionType: this.tectonicRegionType,
      mfd: this._mfd,
    };
  }

  toString(): string {
    return `<${this.constructor.name} ${this.sourceId}>`;
  }
}

export class PointSource extends BaseSource {
  readonly kind: SourceKind = 'point';

  constructor(
    init: SourceInit,
    public readonly location: Point,
    public readonly upperSeismogenicDepth: number,
    public readonly lowerSeismogenicDepth: number
  ) {
    super(init);
  }

  protected duplicate(mfd: MagnitudeFrequencyDistribution): PointSource {
    return new PointSource(
      { ...this.init(), mfd },
      this.location,
      this.upperSeismogenicDepth,
      this.lowerSeismogenicDepth
    );
  }
}

/**
 * Area source: a point source spread over a polygon
 */
export class AreaSource extends PointSource {
  override readonly kind: SourceKind = 'area';

  constructor(
    init: SourceInit,
    public readonly polygon: readonly Point[],
    public readonly areaDiscretization: number,
    upperSeismogenicDepth: number,
    lowerSeismogenicDepth: number
  ) {
    const [first] = polygon;
    if (first === undefined) {
      throw new GeometryError('an area source needs a polygon', {
        sourceId: init.sourceId,
      });
    }
    super(init, first, upperSeismogenicDepth, lowerSeismogenicDepth);
  }

  protected override duplicate(mfd: MagnitudeFrequencyDistribution): AreaSource {
    return new AreaSource(
      { ...this.init(), mfd },
      this.polygon,
      this.areaDiscretization,
      this.upperSeismogenicDepth,
      this.lowerSeismogenicDepth
    );
  }
}

function checkDip(dip: number, sourceId: string): void {
  if (!(dip > 0 && dip <= 90)) {
    throw new ModificationError('dip must be between 0 (exclusive) and 90', {
      sourceId,
      value: dip,
    });
  }
}

export class SimpleFaultSource extends BaseSource {
  readonly kind: SourceKind = 'simpleFault';
  private _geometry: SimpleFaultGeometry;

  constructor(
    init: SourceInit,
    geometry: SimpleFaultGeometry,
    public readonly rake: number
  ) {
    super(init);
    checkDip(geometry.dip, init.sourceId);
    this._geometry = geometry;
  }

  get geometry(): SimpleFaultGeometry {
    return this._geometry;
  }

  get dip(): number {
    return this._geometry.dip;
  }

  override modify(modification: SourceModification): void {
    switch (modification.name) {
      case 'adjust_dip':
        this.setDip(this._geometry.dip + modification.increment);
        return;
      case 'set_dip':
        this.setDip(modification.dip);
        return;
      case 'set_geometry': {
        const { geometry } = modification;
        if (geometry.kind !== 'simpleFault') {
          throw new ModificationError(
            `${this.toString()} cannot take a ${geometry.kind} geometry`,
            { sourceId: this.sourceId }
          );
        }
        checkDip(geometry.dip, this.sourceId);
        this._geometry = geometry;
        return;
      }
      default: {
        const _exhaustive: never = modification;
        return _exhaustive;
      }
    }
  }

  private setDip(dip: number): void {
    checkDip(dip, this.sourceId);
    this._geometry = { ...this._geometry, dip };
  }

  protected duplicate(mfd: MagnitudeFrequencyDistribution): SimpleFaultSource {
    return new SimpleFaultSource(
      { ...this.init(), mfd },
      this._geometry,
      this.rake
    );
  }
}

export class ComplexFaultSource extends BaseSource {
  readonly kind: SourceKind = 'complexFault';
  private _geometry: ComplexFaultGeometry;

  constructor(
    init: SourceInit,
    geometry: ComplexFaultGeometry,
    public readonly rake: number
  ) {
    super(init);
    this._geometry = geometry;
  }

  get geometry(): ComplexFaultGeometry {
    return this._geometry;
  }

  override modify(modification: SourceModification): void {
    if (modification.name !== 'set_geometry') {
      super.modify(modification);
      return;
    }
    const { geometry } = modification;
    if (geometry.kind !== 'complexFault') {
      throw new ModificationError(
        `${this.toString()} cannot take a ${geometry.kind} geometry`,
        { sourceId: this.sourceId }
      );
    }
    this._geometry = geometry;
  }

  protected duplicate(mfd: MagnitudeFrequencyDistribution): ComplexFaultSource {
    return new ComplexFaultSource(
      { ...this.init(), mfd },
      this._geometry,
      this.rake
    );
  }
}

export class CharacteristicFaultSource extends BaseSource {
  readonly kind: SourceKind = 'characteristicFault';
  private _surface: Surface;

  constructor(init: SourceInit, surface: Surface, public readonly rake: number) {
    super(init);
    this._surface = surface;
  }

  get surface(): Surface {
    return this._surface;
  }

  override isMultiSurface(): boolean {
    return (
      this._surface.kind === 'multiSurface' && this._surface.surfaces.length > 1
    );
  }

  override modify(modification: SourceModification): void {
    if (modification.name !== 'set_geometry') {
      super.modify(modification);
      return;
    }
    const { geometry } = modification;
    if (geometry.kind === 'simpleFault' || geometry.kind === 'complexFault') {
      throw new ModificationError(
        `${this.toString()} needs a surface, not a ${geometry.kind} geometry`,
        { sourceId: this.sourceId }
      );
    }
    this._surface = geometry;
  }

  protected duplicate(
    mfd: MagnitudeFrequencyDistribution
  ): CharacteristicFaultSource {
    return new CharacteristicFaultSource(
      { ...this.init(), mfd },
      this._surface,
      this.rake
    );
  }
}
