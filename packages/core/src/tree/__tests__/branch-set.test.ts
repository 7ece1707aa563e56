import { describe, expect, it } from 'vitest';
import { BranchSet } from '../branch-set.js';
import {
  ACTIVE,
  branch,
  branchSet,
  pointSource,
  twoLevelTree,
} from '../../test-utils/logic-tree.js';
import {
  BranchNotFoundError,
  ContractViolationError,
  LogicTreePathError,
} from '../../types/errors.js';

describe('BranchSet', () => {
  it('refuses an empty branch list', () => {
    expect(
      () => new BranchSet({ id: 'bs9', uncertaintyType: 'gmpeModel', branches: [] })
    ).toThrow(ContractViolationError);
  });

  it('looks branches up by id', () => {
    const { root, b2 } = twoLevelTree();
    expect(root.get('b2')).toBe(b2);
  });

  it('raises when the id is missing', () => {
    const { root } = twoLevelTree();
    expect(() => root.get('b3')).toThrow(BranchNotFoundError);
    expect(() => root.get('b3')).toThrow("Branch 'b3' not found in branch set <b1 b2>");
  });

  it('describes itself', () => {
    const { root, b1 } = twoLevelTree();
    expect(root.toString()).toBe('<b1 b2>');
    expect(b1.toString()).toBe('b1<c1 c2>');
  });

  it('defaults to an unfiltered, non-collapsed set', () => {
    const bset = branchSet({ uncertaintyType: 'bGRRelative' }, [
      branch('', 'b1', 1, 0.1),
    ]);
    expect(bset.id).toBe('');
    expect(bset.collapsed).toBe(false);
    expect(bset.filters).toEqual({});
    expect(bset.filterSource(pointSource('p1'))).toBe(true);
  });

  it('filters sources through its filters', () => {
    const bset = branchSet(
      {
        uncertaintyType: 'bGRRelative',
        filters: { applyToTectonicRegionType: ACTIVE, applyToSources: ['p2'] },
      },
      [branch('bs1', 'b1', 1, 0.1)]
    );
    expect(bset.filterSource(pointSource('p1'))).toBe(false);
    expect(bset.filterSource(pointSource('p2'))).toBe(true);
  });

  it('does not follow later changes of the branch list it was given', () => {
    const branches = [branch('bs1', 'b1', 1, 0.1)];
    const bset = branchSet({ uncertaintyType: 'bGRRelative' }, branches);
    branches.push(branch('bs1', 'b2', 0, 0.2));
    expect(bset.branches).toHaveLength(1);
  });
});

describe('getBsetValues', () => {
  it('pairs each level with the chosen value', () => {
    const { root, child } = twoLevelTree();
    const pairs = root.getBsetValues(['b1', 'c1']);
    expect(pairs).toHaveLength(2);
    expect(pairs[0]?.[0]).toBe(root);
    expect(pairs[0]?.[1]).toBe('model-a.xml');
    expect(pairs[1]?.[0]).toBe(child);
    expect(pairs[1]?.[1]).toBe(0.2);
  });

  it('stops when the ids run out', () => {
    const { root } = twoLevelTree();
    expect(root.getBsetValues(['b1'])).toEqual([[root, 'model-a.xml']]);
    expect(root.getBsetValues([])).toEqual([]);
  });

  it('drops leftover ids under the lenient policy', () => {
    const { root } = twoLevelTree();
    expect(root.getBsetValues(['b2', 'c1', 'x'])).toEqual([[root, 'model-b.xml']]);
  });

  it('raises on leftover ids under the strict policy', () => {
    const { root } = twoLevelTree();
    expect(() =>
      root.getBsetValues(['b2', 'c1'], { pathPolicy: 'strict' })
    ).toThrow(LogicTreePathError);
    expect(
      root.getBsetValues(['b1', 'c2'], { pathPolicy: 'strict' })
    ).toHaveLength(2);
  });

  it('raises on an unknown id at any level', () => {
    const { root } = twoLevelTree();
    expect(() => root.getBsetValues(['b1', 'c9'])).toThrow(
      "Branch 'c9' not found in branch set <c1 c2>"
    );
  });
});
