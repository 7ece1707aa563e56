import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import type { BranchSet } from '../branch-set.js';
import { branch, branchSet, twoLevelTree } from '../../test-utils/logic-tree.js';
import { ContractViolationError } from '../../types/errors.js';

type Shape = {
  collapsed: boolean;
  branches: Array<{ units: number; child: Shape | undefined }>;
};

function shapeArb(depth: number): fc.Arbitrary<Shape> {
  const child: fc.Arbitrary<Shape | undefined> =
    depth === 0
      ? fc.constant(undefined)
      : fc.option(shapeArb(depth - 1), { nil: undefined, freq: 2 });
  return fc.record({
    collapsed: fc.boolean(),
    branches: fc.array(
      fc.record({ units: fc.integer({ min: 1, max: 9 }), child }),
      { minLength: 1, maxLength: 3 }
    ),
  });
}

function build(shape: Shape, id: string): BranchSet {
  const total = shape.branches.reduce((sum, b) => sum + b.units, 0);
  return branchSet(
    { id, uncertaintyType: 'bGRRelative', collapsed: shape.collapsed },
    shape.branches.map((b, i) =>
      branch(
        id,
        `${id}.${i}`,
        b.units / total,
        i / 10,
        b.child ? build(b.child, `${id}.${i}`) : undefined
      )
    )
  );
}

function countPaths(shape: Shape): number {
  const branches = shape.collapsed
    ? shape.branches.slice(0, 1)
    : shape.branches;
  return branches.reduce(
    (sum, b) => sum + (b.child ? countPaths(b.child) : 1),
    0
  );
}

function chain(levels: number): BranchSet {
  let bset: BranchSet | undefined;
  for (let level = levels - 1; level >= 0; level--) {
    bset = branchSet({ id: `bs${level}`, uncertaintyType: 'bGRRelative' }, [
      branch(`bs${level}`, `l${level}`, 1, 0, bset),
    ]);
  }
  if (!bset) throw new Error('chain needs at least one level');
  return bset;
}

describe('enumeratePaths', () => {
  it('walks the two-level tree depth first', () => {
    const { root } = twoLevelTree();
    const paths = [...root.enumeratePaths()].map(({ weight, path }) => ({
      weight,
      ids: path.map((b) => b.branchId),
    }));
    expect(paths.map((p) => p.ids)).toEqual([['b1', 'c1'], ['b1', 'c2'], ['b2']]);
    expect(paths[0]?.weight).toBeCloseTo(0.42, 12);
    expect(paths[1]?.weight).toBeCloseTo(0.18, 12);
    expect(paths[2]?.weight).toBeCloseTo(0.4, 12);
    const total = paths.reduce((sum, p) => sum + p.weight, 0);
    expect(total).toBeCloseTo(1, 9);
  });

  it('keeps the original branch objects on plain levels', () => {
    const { root, b1, c2 } = twoLevelTree();
    const second = [...root.enumeratePaths()][1];
    expect(second?.path[0]).toBe(b1);
    expect(second?.path[1]).toBe(c2);
  });

  it('is lazy and restartable', () => {
    const { root } = twoLevelTree();
    const iterator = root.enumeratePaths();
    const first = iterator.next();
    expect(first.done).toBe(false);
    if (!first.done) {
      expect(first.value.path.map((b) => b.branchId)).toEqual(['b1', 'c1']);
    }
    const again = [...root.enumeratePaths()];
    expect(again).toHaveLength(3);
    expect([...iterator]).toHaveLength(2);
  });

  it('contributes one full-weight copy of the first branch at a collapsed set', () => {
    const c1 = branch('bs2', 'c1', 0.7, 0.2);
    const child = branchSet(
      { id: 'bs2', uncertaintyType: 'maxMagGRRelative', collapsed: true },
      [c1, branch('bs2', 'c2', 0.3, -0.2)]
    );
    const root = branchSet({ id: 'bs1', uncertaintyType: 'sourceModel' }, [
      branch('bs1', 'b1', 0.6, 'model-a.xml', child),
      branch('bs1', 'b2', 0.4, 'model-b.xml'),
    ]);
    const paths = [...root.enumeratePaths()];
    expect(paths).toHaveLength(2);
    const [first] = paths;
    expect(first?.weight).toBe(0.6);
    const synthetic = first?.path[1];
    expect(synthetic).not.toBe(c1);
    expect(synthetic?.branchId).toBe('c1');
    expect(synthetic?.weight).toBe(1);
    expect(synthetic?.value).toBe(0.2);
    expect(c1.weight).toBe(0.7);
  });

  it('refuses trees deeper than guards.maxDepth', () => {
    expect(() => [...chain(3).enumeratePaths({ guards: { maxDepth: 2 } })]).toThrow(
      ContractViolationError
    );
    expect([...chain(2).enumeratePaths({ guards: { maxDepth: 2 } })]).toHaveLength(1);
  });

  it('walks very deep chains without recursion', () => {
    const [only] = [...chain(20_000).enumeratePaths({ guards: { maxDepth: 20_000 } })];
    expect(only?.path).toHaveLength(20_000);
    expect(only?.weight).toBe(1);
  });

  it('conserves weight on any conforming tree', () => {
    fc.assert(
      fc.property(shapeArb(3), (shape) => {
        const paths = [...build(shape, 'r').enumeratePaths()];
        const total = paths.reduce((sum, p) => sum + p.weight, 0);
        expect(Math.abs(total - 1)).toBeLessThan(1e-9);
        expect(paths).toHaveLength(countPaths(shape));
      })
    );
  });
});
