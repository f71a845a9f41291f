import { describe, expect, it } from 'vitest';
import { DifferenceIndex } from './DifferenceIndex.js';
import { classify, classifyRow, CellComparator } from './classify.js';
import { DefaultAligner } from '../align/DefaultAligner.js';
import { normalizerOf, panesOf } from '../fixtures.test-helpers.js';
import { NavigateDirection, RowKind } from '../types/enums.js';
import type { EqualityPolicy } from '../types/equality.js';
import type { Line } from '../types/line.js';

function indexFor(panes: Line[][], referencePane = 0, policy: Partial<EqualityPolicy> = {}): DifferenceIndex {
  const normalizer = normalizerOf(policy);
  const table = new DefaultAligner().compute(panes, [], normalizer, { referencePane });
  if (!table.ok) throw new Error(table.error.message);
  return DifferenceIndex.build(table.value, panes, normalizer, referencePane);
}

describe('classify', () => {
  it('finds no blocks between identical panes', () => {
    expect(indexFor(panesOf(['a', 'b'], ['a', 'b'], ['a', 'b'])).blocks).toEqual([]);
  });

  it('reports a changed row as one block', () => {
    const index = indexFor(panesOf(['a', 'b', 'c'], ['a', 'x', 'c']));
    expect(index.blocks).toEqual([{ index: 0, startRow: 1, endRow: 2, kind: RowKind.CHANGED, panes: [1], conflict: false }]);
  });

  it('treats case-only differences as the same when case is ignored', () => {
    const panes = panesOf(['B'], ['b']);
    expect(indexFor(panes).blocks).toHaveLength(1);
    expect(indexFor(panes, 0, { ignoreCase: true }).blocks).toEqual([]);
  });

  it('classifies rows relative to the reference pane', () => {
    const panes = panesOf(['a', 'b'], ['a', 'n', 'b']);
    const compare = new CellComparator(panes, normalizerOf());
    expect(classifyRow([null, 1], compare, 0)).toBe(RowKind.INSERTED);
    expect(classifyRow([1, null], compare, 0)).toBe(RowKind.DELETED);
    expect(classifyRow([null, 1], compare, 1)).toBe(RowKind.DELETED);
    expect(classifyRow([0, 0], compare, 0)).toBe(RowKind.SAME);
    expect(classifyRow([1, 1], compare, 0)).toBe(RowKind.CHANGED);
  });

  it('merges adjacent differing rows into one block of mixed kind', () => {
    const index = indexFor(panesOf(['a', 'b', 'z'], ['a', 'x', 'y', 'z']));
    expect(index.blocks).toEqual([{ index: 0, startRow: 1, endRow: 3, kind: RowKind.CHANGED, panes: [1], conflict: false }]);
  });

  it('keeps insert-only blocks typed as inserted', () => {
    const index = indexFor(panesOf(['a', 'c'], ['a', 'b', 'c']));
    expect(index.blocks.map((b) => b.kind)).toEqual([RowKind.INSERTED]);
  });

  it('ignores blank-only rows when blank lines are ignored', () => {
    const panes = panesOf(['a', '', 'b'], ['a', 'b']);
    expect(indexFor(panes).blocks).toHaveLength(1);
    expect(indexFor(panes, 0, { ignoreBlankLines: true }).blocks).toEqual([]);
  });

  it('flags blocks where several panes change differently', () => {
    const index = indexFor(panesOf(['1', 'L', '2'], ['1', 'X', '2'], ['1', 'R', '2']), 1);
    expect(index.blocks).toEqual([{ index: 0, startRow: 1, endRow: 2, kind: RowKind.CHANGED, panes: [0, 2], conflict: true }]);
    const agreed = indexFor(panesOf(['1', 'Y', '2'], ['1', 'X', '2'], ['1', 'Y', '2']), 1);
    expect(agreed.blocks[0].conflict).toBe(false);
  });

  it('works from a table directly', () => {
    const panes = panesOf(['a'], ['b']);
    const blocks = classify({ paneCount: 2, rows: [{ cells: [0, null] }, { cells: [null, 0] }], pinRows: [] }, panes, normalizerOf(), 0);
    expect(blocks).toEqual([{ index: 0, startRow: 0, endRow: 2, kind: RowKind.CHANGED, panes: [1], conflict: false }]);
  });
});

describe('DifferenceIndex navigation', () => {
  const index = indexFor(panesOf(['a', 'b', 'c', 'd', 'e'], ['a', 'B', 'c', 'D', 'e']));

  it('walks blocks in row order and wraps with a signal', () => {
    const [first, second] = index.blocks;
    expect(index.next(null)).toEqual({ block: first, wrapped: false });
    expect(index.next(first)).toEqual({ block: second, wrapped: false });
    expect(index.next(second)).toEqual({ block: first, wrapped: true });
    expect(index.previous(first)).toEqual({ block: second, wrapped: true });
    expect(index.previous(second)).toEqual({ block: first, wrapped: false });
    expect(index.previous(null)).toEqual({ block: second, wrapped: false });
  });

  it('jumps to either end', () => {
    expect(index.navigate(NavigateDirection.FIRST, null).block?.startRow).toBe(1);
    expect(index.navigate(NavigateDirection.LAST, null).block?.startRow).toBe(3);
  });

  it('finds blocks by row', () => {
    expect(index.blockAtRow(3)?.index).toBe(1);
    expect(index.blockAtRow(2)).toBeNull();
    expect(index.blockFrom(2)?.index).toBe(1);
    expect(index.blockFrom(4)).toBeNull();
  });

  it('returns nothing when there are no blocks', () => {
    const empty = new DifferenceIndex([]);
    expect(empty.next(null)).toEqual({ block: null, wrapped: false });
    expect(empty.navigate(NavigateDirection.PREVIOUS, null)).toEqual({ block: null, wrapped: false });
    expect(empty.size).toBe(0);
  });
});
