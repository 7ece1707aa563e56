import { describe, expect, it } from 'vitest';
import { parseUncertainty } from '../parse.js';
import type { UncertaintyNode } from '../../parser/node.js';
import { Line } from '../../geo/line.js';
import { Point } from '../../geo/point.js';
import {
  ComplexFaultSurface,
  MultiSurface,
  PlanarSurface,
  SimpleFaultSurface,
} from '../../geo/surface.js';
import { LogicTreeError } from '../../types/errors.js';

const FILE = 'tree.xml';

function model(text: string, lineno = 3): UncertaintyNode {
  return { tag: 'uncertaintyModel', text, lineno };
}

function posList(text: string): UncertaintyNode {
  return {
    tag: 'gml:LineString',
    nodes: [{ tag: 'gml:posList', text }],
  };
}

function simpleFaultNode(
  coords = '10.0 45.0 10.5 45.2',
  spacing = '1.0'
): UncertaintyNode {
  return {
    tag: 'simpleFaultGeometry',
    attrib: { spacing },
    lineno: 6,
    nodes: [
      posList(coords),
      { tag: 'dip', text: '30' },
      { tag: 'upperSeismoDepth', text: '0' },
      { tag: 'lowerSeismoDepth', text: '12' },
    ],
  };
}

function planarNode(offset: number): UncertaintyNode {
  const corner = (tag: string, lon: number, depth: number): UncertaintyNode => ({
    tag,
    attrib: { lon: lon + offset, lat: 45, depth },
  });
  return {
    tag: 'planarSurface',
    attrib: { spacing: 1 },
    nodes: [
      corner('topLeft', 10, 0),
      corner('topRight', 10.5, 0),
      corner('bottomRight', 10.5, 10),
      corner('bottomLeft', 10, 10),
    ],
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseUncertainty', () => {
  describe('model references', () => {
    it.each(['sourceModel', 'extendModel', 'gmpeModel'])(
      'trims the %s text',
      (type) => {
        expect(parseUncertainty(type, model('  model-a.xml\n'), FILE)).toBe(
          'model-a.xml'
        );
      }
    );

    it('rejects an empty reference', () => {
      expect(() => parseUncertainty('sourceModel', model('  '), FILE)).toThrow(
        "filename 'tree.xml', line 3: expected a model reference"
      );
    });
  });

  describe('single floats', () => {
    it.each([
      'maxMagGRRelative',
      'bGRRelative',
      'maxMagGRAbsolute',
      'simpleFaultDipRelative',
      'simpleFaultDipAbsolute',
    ])('reads %s as a float', (type) => {
      expect(parseUncertainty(type, model(' -0.25 '), FILE)).toBe(-0.25);
    });

    it('falls back to a float for unknown tags', () => {
      expect(parseUncertainty('someFutureTag', model('1.5'), FILE)).toBe(1.5);
    });

    it('rejects text that is not a float', () => {
      expect(() => parseUncertainty('bGRRelative', model('0.1x', 8), FILE)).toThrow(
        "filename 'tree.xml', line 8: expected single float value"
      );
      expect(() => parseUncertainty('someFutureTag', model(''), FILE)).toThrow(
        LogicTreeError
      );
    });

    it.each(['0x10', '0b1', '0o7'])('rejects the non-decimal literal %s', (text) => {
      expect(() => parseUncertainty('maxMagGRRelative', model(text, 4), FILE)).toThrow(
        "filename 'tree.xml', line 4: expected single float value"
      );
    });
  });

  describe('abGRAbsolute', () => {
    it('reads a pair', () => {
      expect(parseUncertainty('abGRAbsolute', model('3.5  0.9'), FILE)).toEqual([
        3.5, 0.9,
      ]);
    });

    it.each(['3.5', '3.5 0.9 1.0', '3.5 b'])('rejects %j', (text) => {
      expect(() => parseUncertainty('abGRAbsolute', model(text), FILE)).toThrow(
        "filename 'tree.xml', line 3: expected a pair of floats separated by space"
      );
    });
  });

  describe('incrementalMFDAbsolute', () => {
    const mfdNode = (minMag: string): UncertaintyNode => ({
      tag: 'uncertaintyModel',
      nodes: [
        {
          tag: 'incrementalMFD',
          attrib: { minMag, binWidth: '0.1' },
          lineno: 4,
          nodes: [{ tag: 'occurRates', text: '0.01 0.005' }],
        },
      ],
    });

    it('reads the incremental distribution', () => {
      expect(
        parseUncertainty('incrementalMFDAbsolute', mfdNode('5.0'), FILE)
      ).toEqual({ minMag: 5, binWidth: 0.1, occurrenceRates: [0.01, 0.005] });
    });

    it('points at the incrementalMFD node when an attribute is bad', () => {
      expect(() =>
        parseUncertainty('incrementalMFDAbsolute', mfdNode('five'), FILE)
      ).toThrow("filename 'tree.xml', line 4: 'incrementalMFD' node is not valid");
    });
  });

  describe('simpleFaultGeometryAbsolute', () => {
    it('reads the geometry from a wrapper node', () => {
      const value = parseUncertainty(
        'simpleFaultGeometryAbsolute',
        { tag: 'uncertaintyModel', nodes: [simpleFaultNode()] },
        FILE
      );
      expect(value).toEqual({
        kind: 'simpleFault',
        trace: new Line([new Point(10, 45), new Point(10.5, 45.2)]),
        upperSeismogenicDepth: 0,
        lowerSeismogenicDepth: 12,
        dip: 30,
        spacing: 1,
      });
    });

    it('accepts the geometry node itself', () => {
      const value = parseUncertainty(
        'simpleFaultGeometryAbsolute',
        simpleFaultNode(),
        FILE
      );
      expect(value).toMatchObject({ kind: 'simpleFault', dip: 30 });
    });

    it.each([
      ['a latitude out of range', '10.0 95.0 10.5 45.2', '1.0'],
      ['a non-positive spacing', '10.0 45.0 10.5 45.2', '0'],
      ['a single-point trace', '10.0 45.0', '1.0'],
    ])('rejects %s', (_label, coords, spacing) => {
      const error = catchError(() =>
        parseUncertainty(
          'simpleFaultGeometryAbsolute',
          simpleFaultNode(coords, spacing),
          FILE
        )
      );
      expect(error).toBeInstanceOf(LogicTreeError);
      if (error instanceof LogicTreeError) {
        expect(error.message).toBe(
          "filename 'tree.xml', line 6: 'simpleFaultGeometry' node is not valid"
        );
        expect(error.cause).toBeInstanceOf(Error);
      }
    });
  });

  describe('complexFaultGeometryAbsolute', () => {
    const complexNode = (bottom: string): UncertaintyNode => ({
      tag: 'complexFaultGeometry',
      attrib: { spacing: '2' },
      lineno: 9,
      nodes: [
        { tag: 'faultTopEdge', nodes: [posList('10 45 0 10.5 45 0')] },
        { tag: 'faultBottomEdge', nodes: [posList(bottom)] },
      ],
    });

    it('reads the edges with depths', () => {
      const value = parseUncertainty(
        'complexFaultGeometryAbsolute',
        { tag: 'uncertaintyModel', nodes: [complexNode('10 45.1 10 10.5 45.1 10')] },
        FILE
      );
      expect(value).toEqual({
        kind: 'complexFault',
        edges: [
          new Line([new Point(10, 45, 0), new Point(10.5, 45, 0)]),
          new Line([new Point(10, 45.1, 10), new Point(10.5, 45.1, 10)]),
        ],
        spacing: 2,
      });
    });

    it('rejects a negative depth', () => {
      expect(() =>
        parseUncertainty(
          'complexFaultGeometryAbsolute',
          complexNode('10 45.1 -1 10.5 45.1 10'),
          FILE
        )
      ).toThrow(
        "filename 'tree.xml', line 9: 'complexFaultGeometry' node is not valid"
      );
    });
  });

  describe('characteristicFaultGeometryAbsolute', () => {
    const surfaceNode = (...nodes: UncertaintyNode[]): UncertaintyNode => ({
      tag: 'uncertaintyModel',
      nodes: [{ tag: 'surface', lineno: 11, nodes }],
    });

    it('reads a single planar surface', () => {
      const value = parseUncertainty(
        'characteristicFaultGeometryAbsolute',
        surfaceNode(planarNode(0)),
        FILE
      );
      expect(value).toBeInstanceOf(PlanarSurface);
      if (value instanceof PlanarSurface) {
        expect(value.corners.map((p) => p.depth)).toEqual([0, 0, 10, 10]);
      }
    });

    it('builds a simple fault surface from fault data', () => {
      const value = parseUncertainty(
        'characteristicFaultGeometryAbsolute',
        surfaceNode(simpleFaultNode()),
        FILE
      );
      expect(value).toBeInstanceOf(SimpleFaultSurface);
    });

    it('merges several sub-shapes into a multi surface', () => {
      const value = parseUncertainty(
        'characteristicFaultGeometryAbsolute',
        surfaceNode(planarNode(0), planarNode(1)),
        FILE
      );
      expect(value).toBeInstanceOf(MultiSurface);
      if (value instanceof MultiSurface) {
        expect(value.surfaces).toHaveLength(2);
      }
    });

    it('builds a complex fault surface', () => {
      const value = parseUncertainty(
        'characteristicFaultGeometryAbsolute',
        surfaceNode({
          tag: 'complexFaultGeometry',
          attrib: { spacing: '2' },
          nodes: [
            { tag: 'faultTopEdge', nodes: [posList('10 45 0 10.5 45 0')] },
            { tag: 'faultBottomEdge', nodes: [posList('10 45 9 10.5 45 9')] },
          ],
        }),
        FILE
      );
      expect(value).toBeInstanceOf(ComplexFaultSurface);
    });

    it('rejects unknown sub-shapes', () => {
      expect(() =>
        parseUncertainty(
          'characteristicFaultGeometryAbsolute',
          surfaceNode({ tag: 'kiteSurface', lineno: 12 }),
          FILE
        )
      ).toThrow("filename 'tree.xml', line 12: Surface geometry type not recognised");
    });

    it('rejects an empty surface', () => {
      expect(() =>
        parseUncertainty('characteristicFaultGeometryAbsolute', surfaceNode(), FILE)
      ).toThrow("filename 'tree.xml', line 11: 'surface' node holds no geometry");
    });

    it('rejects a planar corner without depth', () => {
      const broken: UncertaintyNode = {
        ...planarNode(0),
        lineno: 14,
        nodes: [{ tag: 'topLeft', attrib: { lon: 10, lat: 45 } }],
      };
      expect(() =>
        parseUncertainty('characteristicFaultGeometryAbsolute', surfaceNode(broken), FILE)
      ).toThrow("filename 'tree.xml', line 14: 'planarFaultGeometry' node is not valid");
    });
  });
});
