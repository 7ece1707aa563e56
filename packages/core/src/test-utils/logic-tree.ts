import { Line } from '../geo/line.js';
import { Point } from '../geo/point.js';
import {
  MultiSurface,
  PlanarSurface,
  type SimpleFaultGeometry,
  type Surface,
} from '../geo/surface.js';
import { TruncatedGRMFD } from '../source/mfd.js';
import {
  AreaSource,
  CharacteristicFaultSource,
  PointSource,
  SimpleFaultSource,
  type SourceInit,
} from '../source/sources.js';
import { Branch } from '../tree/branch.js';
import { BranchSet, type BranchSetInit } from '../tree/branch-set.js';
import type { UncertaintyValue } from '../uncertainty/types.js';

export const ACTIVE = 'Active Shallow Crust';
export const STABLE = 'Stable Shallow Crust';

export function branch(
  bsId: string,
  branchId: string,
  weight: number,
  value: UncertaintyValue,
  bset?: BranchSet
): Branch {
  return new Branch({ bsId, branchId, weight, value, bset });
}

export function branchSet(
  init: Omit<BranchSetInit, 'branches'>,
  branches: readonly Branch[]
): BranchSet {
  return new BranchSet({ ...init, branches });
}

/**
 * root <b1 (0.6) -> child <c1 (0.7) c2 (0.3)>, b2 (0.4)>
 */
export function twoLevelTree(): {
  root: BranchSet;
  child: BranchSet;
  b1: Branch;
  b2: Branch;
  c1: Branch;
  c2: Branch;
} {
  const c1 = branch('bs2', 'c1', 0.7, 0.2);
  const c2 = branch('bs2', 'c2', 0.3, -0.2);
  const child = branchSet(
    { id: 'bs2', uncertaintyType: 'maxMagGRRelative' },
    [c1, c2]
  );
  const b1 = branch('bs1', 'b1', 0.6, 'model-a.xml', child);
  const b2 = branch('bs1', 'b2', 0.4, 'model-b.xml');
  const root = branchSet({ id: 'bs1', uncertaintyType: 'sourceModel' }, [
    b1,
    b2,
  ]);
  return { root, child, b1, b2, c1, c2 };
}

export function grMfd(): TruncatedGRMFD {
  return new TruncatedGRMFD(5.0, 7.0, 0.1, 4.0, 1.0);
}

function init(sourceId: string, tectonicRegionType: string): SourceInit {
  return { sourceId, name: sourceId, tectonicRegionType, mfd: grMfd() };
}

export function pointSource(
  sourceId: string,
  tectonicRegionType = ACTIVE
): PointSource {
  return new PointSource(
    init(sourceId, tectonicRegionType),
    new Point(10, 45, 5),
    0,
    20
  );
}

export function areaSource(
  sourceId: string,
  tectonicRegionType = ACTIVE
): AreaSource {
  return new AreaSource(
    init(sourceId, tectonicRegionType),
    [new Point(10, 45), new Point(11, 45), new Point(11, 46)],
    5,
    0,
    20
  );
}

export function faultTrace(): Line {
  return new Line([new Point(10, 45), new Point(10.5, 45.2)]);
}

export function simpleFaultGeometry(dip = 45): SimpleFaultGeometry {
  return {
    kind: 'simpleFault',
    trace: faultTrace(),
    upperSeismogenicDepth: 0,
    lowerSeismogenicDepth: 15,
    dip,
    spacing: 1,
  };
}

export function simpleFaultSource(
  sourceId: string,
  dip = 45,
  tectonicRegionType = ACTIVE
): SimpleFaultSource {
  return new SimpleFaultSource(
    init(sourceId, tectonicRegionType),
    simpleFaultGeometry(dip),
    90
  );
}

export function planarSurface(offset = 0): PlanarSurface {
  return PlanarSurface.fromCornerPoints(
    new Point(10 + offset, 45, 0),
    new Point(10.5 + offset, 45, 0),
    new Point(10.5 + offset, 45, 10),
    new Point(10 + offset, 45, 10)
  );
}

export function characteristicSource(
  sourceId: string,
  surface: Surface = planarSurface()
): CharacteristicFaultSource {
  return new CharacteristicFaultSource(init(sourceId, ACTIVE), surface, 90);
}

export function multiSurface(): MultiSurface {
  return new MultiSurface([planarSurface(), planarSurface(1)]);
}
