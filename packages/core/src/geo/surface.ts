import { GeometryError } from '../types/errors.js';
import type { Line } from './line.js';
import type { Point } from './point.js';

// Surfaces here are descriptors: they record the data a rupture mesh would be
// built from and enforce the basic ranges, without any geodetic computation.

export interface SimpleFaultGeometry {
  readonly kind: 'simpleFault';
  readonly trace: Line;
  readonly upperSeismogenicDepth: number;
  readonly lowerSeismogenicDepth: number;
  readonly dip: number;
  readonly spacing: number;
}

export interface ComplexFaultGeometry {
  readonly kind: 'complexFault';
  readonly edges: readonly Line[];
  readonly spacing: number;
}

function checkFaultData(
  upperSeismogenicDepth: number,
  lowerSeismogenicDepth: number,
  dip: number,
  spacing: number
): void {
  if (!(upperSeismogenicDepth >= 0)) {
    throw new GeometryError('upper seismogenic depth must be non-negative', {
      value: upperSeismogenicDepth,
    });
  }
  if (!(lowerSeismogenicDepth > upperSeismogenicDepth)) {
    throw new GeometryError(
      'lower seismogenic depth must be below upper seismogenic depth',
      { value: lowerSeismogenicDepth }
    );
  }
  if (!(dip > 0 && dip <= 90)) {
    throw new GeometryError('dip must be between 0 (exclusive) and 90', {
      value: dip,
    });
  }
  if (!(spacing > 0)) {
    throw new GeometryError('mesh spacing must be positive', {
      value: spacing,
    });
  }
}

export class SimpleFaultSurface {
  readonly kind = 'simpleFaultSurface' as const;

  private constructor(public readonly geometry: SimpleFaultGeometry) {}

  static fromFaultData(
    trace: Line,
    upperSeismogenicDepth: number,
    lowerSeismogenicDepth: number,
    dip: number,
    spacing: number
  ): SimpleFaultSurface {
    checkFaultData(upperSeismogenicDepth, lowerSeismogenicDepth, dip, spacing);
    return new SimpleFaultSurface({
      kind: 'simpleFault',
      trace,
      upperSeismogenicDepth,
      lowerSeismogenicDepth,
      dip,
      spacing,
    });
  }
}

export class ComplexFaultSurface {
  readonly kind = 'complexFaultSurface' as const;

  private constructor(public readonly geometry: ComplexFaultGeometry) {}

  static fromFaultData(
    edges: readonly Line[],
    spacing: number
  ): ComplexFaultSurface {
    if (edges.length < 2) {
      throw new GeometryError('a complex fault needs at least two edges', {
        value: edges.length,
      });
    }
    if (!(spacing > 0)) {
      throw new GeometryError('mesh spacing must be positive', {
        value: spacing,
      });
    }
    return new ComplexFaultSurface({
      kind: 'complexFault',
      edges: Object.freeze([...edges]),
      spacing,
    });
  }
}

export class PlanarSurface {
  readonly kind = 'planarSurface' as const;

  private constructor(
    public readonly topLeft: Point,
    public readonly topRight: Point,
    public readonly bottomRight: Point,
    public readonly bottomLeft: Point
  ) {}

  static fromCornerPoints(
    topLeft: Point,
    topRight: Point,
    bottomRight: Point,
    bottomLeft: Point
  ): PlanarSurface {
    return new PlanarSurface(topLeft, topRight, bottomRight, bottomLeft);
  }

  get corners(): readonly [Point, Point, Point, Point] {
    return [this.topLeft, this.topRight, this.bottomRight, this.bottomLeft];
  }
}

export type SingleSurface =
  | SimpleFaultSurface
  | ComplexFaultSurface
  | PlanarSurface;

/**
 * Composite of several single surfaces treated as one rupture surface
 */
export class MultiSurface {
  readonly kind = 'multiSurface' as const;
  public readonly surfaces: readonly SingleSurface[];

  constructor(surfaces: readonly SingleSurface[]) {
    if (surfaces.length === 0) {
      throw new GeometryError('a multi surface needs at least one surface');
    }
    this.surfaces = Object.freeze([...surfaces]);
  }
}

export type Surface = SingleSurface | MultiSurface;

export function isMultiSurface(surface: Surface): surface is MultiSurface {
  return surface.kind === 'multiSurface';
}
