/**
 * Geometry readers for the absolute-geometry uncertainties.
 *
 * Each reader raises a LogicTreeError naming the sub-node it was reading when
 * coordinates fall outside longitude [-180, 180], latitude [-90, 90], depth
 * >= 0, or when the mesh spacing is not positive.
 */

import { Line } from '../geo/line.js';
import { Point } from '../geo/point.js';
import {
  ComplexFaultSurface,
  MultiSurface,
  PlanarSurface,
  SimpleFaultSurface,
  type ComplexFaultGeometry,
  type SimpleFaultGeometry,
  type SingleSurface,
  type Surface,
} from '../geo/surface.js';
import { GeometryError, LogicTreeError } from '../types/errors.js';
import {
  attrFloat,
  childFloat,
  childNodes,
  findChild,
  localName,
  toFloatList,
  type UncertaintyNode,
} from './node.js';

const PLANAR_CORNERS = [
  'topLeft',
  'topRight',
  'bottomRight',
  'bottomLeft',
] as const;

function located(
  node: UncertaintyNode,
  filename: string,
  label: string
): <T>(read: () => T) => T {
  return (read) => {
    try {
      return read();
    } catch (error) {
      if (error instanceof GeometryError) {
        throw new LogicTreeError(
          node,
          filename,
          `'${label}' node is not valid`,
          error
        );
      }
      throw error;
    }
  };
}

function surfacePoint(lon: number, lat: number, depth: number): Point {
  if (!(depth >= 0)) {
    throw new GeometryError('depth must be non-negative', { value: depth });
  }
  return new Point(lon, lat, depth);
}

function positiveSpacing(node: UncertaintyNode): number {
  const spacing = attrFloat(node, 'spacing');
  if (spacing === undefined || !(spacing > 0)) {
    throw new GeometryError('spacing must be a positive number', {
      value: node.attrib?.spacing,
    });
  }
  return spacing;
}

function requiredFloat(node: UncertaintyNode, name: string): number {
  const value = childFloat(node, name);
  if (value === undefined) {
    throw new GeometryError(`'${name}' must be a number`);
  }
  return value;
}

/**
 * Points of a `LineString/posList` child; `dims` is 2 (lon lat) or 3
 * (lon lat depth)
 */
function readLine(node: UncertaintyNode, dims: 2 | 3): Line {
  const posList = findChild(node, 'LineString');
  const coords = toFloatList(
    posList ? findChild(posList, 'posList')?.text : undefined
  );
  if (!coords || coords.length === 0 || coords.length % dims !== 0) {
    throw new GeometryError(`expected a list of ${dims}D coordinates`);
  }
  const points: Point[] = [];
  for (let i = 0; i < coords.length; i += dims) {
    const [lon = NaN, lat = NaN, depth = 0] = coords.slice(i, i + dims);
    points.push(surfacePoint(lon, lat, dims === 3 ? depth : 0));
  }
  return new Line(points);
}

/**
 * The geometry node itself, or its `name` child when `node` is a wrapper
 */
function unwrap(node: UncertaintyNode, name: string): UncertaintyNode {
  if (localName(node.tag) === name) return node;
  return findChild(node, name) ?? node;
}

export function parseSimpleFaultGeometry(
  node: UncertaintyNode,
  filename: string
): SimpleFaultGeometry {
  const geomNode = unwrap(node, 'simpleFaultGeometry');
  return located(geomNode, filename, 'simpleFaultGeometry')(() => ({
    kind: 'simpleFault' as const,
    trace: readLine(geomNode, 2),
    upperSeismogenicDepth: requiredFloat(geomNode, 'upperSeismoDepth'),
    lowerSeismogenicDepth: requiredFloat(geomNode, 'lowerSeismoDepth'),
    dip: requiredFloat(geomNode, 'dip'),
    spacing: positiveSpacing(geomNode),
  }));
}

export function parseComplexFaultGeometry(
  node: UncertaintyNode,
  filename: string
): ComplexFaultGeometry {
  const geomNode = unwrap(node, 'complexFaultGeometry');
  return located(geomNode, filename, 'complexFaultGeometry')(() => {
    const edges = childNodes(geomNode).map((edgeNode) => readLine(edgeNode, 3));
    if (edges.length < 2) {
      throw new GeometryError('expected a top and a bottom edge at least');
    }
    return {
      kind: 'complexFault' as const,
      edges,
      spacing: positiveSpacing(geomNode),
    };
  });
}

export function parsePlanarSurface(
  node: UncertaintyNode,
  filename: string
): PlanarSurface {
  return located(node, filename, 'planarFaultGeometry')(() => {
    positiveSpacing(node);
    const [topLeft, topRight, bottomRight, bottomLeft] = PLANAR_CORNERS.map(
      (key) => {
        const corner = findChild(node, key);
        if (!corner) throw new GeometryError(`missing '${key}' corner`);
        const lon = attrFloat(corner, 'lon');
        const lat = attrFloat(corner, 'lat');
        const depth = attrFloat(corner, 'depth');
        if (lon === undefined || lat === undefined || depth === undefined) {
          throw new GeometryError(`'${key}' needs lon, lat and depth`);
        }
        return surfacePoint(lon, lat, depth);
      }
    );
    if (!topLeft || !topRight || !bottomRight || !bottomLeft) {
      throw new GeometryError('a planar surface needs four corners');
    }
    return PlanarSurface.fromCornerPoints(
      topLeft,
      topRight,
      bottomRight,
      bottomLeft
    );
  });
}

/**
 * Surface of a characteristic fault: one sub-shape, or a MultiSurface when
 * the `surface` node lists several
 */
export function parseCharacteristicSurface(
  node: UncertaintyNode,
  filename: string
): Surface {
  const surfaceNode = unwrap(node, 'surface');
  const surfaces: SingleSurface[] = [];
  for (const geomNode of childNodes(surfaceNode)) {
    const name = localName(geomNode.tag);
    if (name === 'simpleFaultGeometry') {
      const g = parseSimpleFaultGeometry(geomNode, filename);
      surfaces.push(
        located(geomNode, filename, name)(() =>
          SimpleFaultSurface.fromFaultData(
            g.trace,
            g.upperSeismogenicDepth,
            g.lowerSeismogenicDepth,
            g.dip,
            g.spacing
          )
        )
      );
    } else if (name === 'complexFaultGeometry') {
      const g = parseComplexFaultGeometry(geomNode, filename);
      surfaces.push(
        located(geomNode, filename, name)(() =>
          ComplexFaultSurface.fromFaultData(g.edges, g.spacing)
        )
      );
    } else if (name === 'planarSurface') {
      surfaces.push(parsePlanarSurface(geomNode, filename));
    } else {
      throw new LogicTreeError(
        geomNode,
        filename,
        'Surface geometry type not recognised'
      );
    }
  }
  const [first] = surfaces;
  if (first === undefined) {
    throw new LogicTreeError(
      surfaceNode,
      filename,
      "'surface' node holds no geometry"
    );
  }
  return surfaces.length > 1 ? new MultiSurface(surfaces) : first;
}
