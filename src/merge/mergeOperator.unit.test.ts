import { describe, expect, it } from 'vitest';
import { MergeOperator } from './MergeOperator.js';
import { DefaultAligner } from '../align/DefaultAligner.js';
import { gridOf, normalizerOf, panesOf } from '../fixtures.test-helpers.js';
import { invert, spliceLines } from '../ops/operations.js';
import { textsOf } from '../text/lines.js';
import { ErrorCode, MergeOrder } from '../types/enums.js';
import type { Line } from '../types/line.js';
import type { EditOperation, ReplaceLinesOp } from '../types/operations.js';
import { OpType } from '../types/operations.js';
import type { Result } from '../types/error.js';

function operatorFor(panes: Line[][], referencePane = 0): MergeOperator {
  const normalizer = normalizerOf();
  const table = new DefaultAligner().compute(panes, [], normalizer, { referencePane });
  if (!table.ok) throw new Error(table.error.message);
  return new MergeOperator({ table: table.value, panes, normalizer });
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

function apply(panes: Line[][], ops: readonly EditOperation[]): Line[][] {
  const copy = panes.map((lines) => [...lines]);
  for (const op of ops) {
    if (op.type === OpType.REPLACE_LINES) spliceLines(copy[op.pane], op);
  }
  return copy;
}

describe('MergeOperator.copySelection', () => {
  it('replaces the destination lines of the block', () => {
    const panes = panesOf(['a', 'b', 'c'], ['a', 'x', 'c']);
    const ops = unwrap(operatorFor(panes).copySelection({ startRow: 1, endRow: 2 }, 0, 1));
    expect(ops).toHaveLength(1);
    expect(ops[0].pane).toBe(1);
    expect(ops[0].start).toBe(1);
    expect(textsOf(ops[0].removed)).toEqual(['x']);
    expect(ops[0].inserted).toEqual([{ text: 'b', eol: '\n', origin: null, modified: true }]);
    expect(textsOf(apply(panes, ops)[1])).toEqual(['a', 'b', 'c']);
  });

  it('turns destination gaps into insertions', () => {
    const panes = panesOf(['a', 'c'], ['a', 'b', 'c']);
    const ops = unwrap(operatorFor(panes).copySelection({ startRow: 1, endRow: 2 }, 1, 0));
    expect(textsOf(apply(panes, ops)[0])).toEqual(['a', 'b', 'c']);
  });

  it('fails when the source has nothing in the block', () => {
    const panes = panesOf(['a', 'c'], ['a', 'b', 'c']);
    const result = operatorFor(panes).copySelection({ startRow: 1, endRow: 2 }, 0, 1);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.RANGE_ERROR);
  });

  it('copying back after a copy changes nothing, and the inverse restores the destination', () => {
    const panes = panesOf(['a', 'b', 'c'], ['a', 'x', 'y', 'c']);
    const forward = unwrap(operatorFor(panes).copySelection({ startRow: 1, endRow: 3 }, 0, 1));
    const copied = apply(panes, forward);
    expect(textsOf(copied[1])).toEqual(['a', 'b', 'c']);

    const back = unwrap(operatorFor(copied).copySelection({ startRow: 1, endRow: 2 }, 1, 0));
    expect(back).toEqual([]);

    const restored = apply(copied, [...forward].reverse().map(invert));
    expect(textsOf(restored[1])).toEqual(['a', 'x', 'y', 'c']);
  });

  it('rejects bad panes and rows', () => {
    const operator = operatorFor(panesOf(['a'], ['b']));
    const cases: Result<ReplaceLinesOp[]>[] = [
      operator.copySelection({ startRow: 0, endRow: 1 }, 0, 0),
      operator.copySelection({ startRow: 0, endRow: 1 }, 0, 2),
      operator.copySelection({ startRow: 0, endRow: 9 }, 0, 1),
      operator.copySelection({ startRow: 1, endRow: 1 }, 0, 1)
    ];
    for (const result of cases) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.RANGE_ERROR);
    }
  });
});

describe('MergeOperator.copyInto', () => {
  it('adds source lines without deleting destination lines', () => {
    const panes = panesOf(['a', 's1', 's2', 'c'], ['a', 'd1', 'c']);
    const operator = operatorFor(panes);
    const ops = unwrap(operator.copyInto(0, 1, { startRow: 1, endRow: 3 }));
    expect(ops.map((op) => [op.start, textsOf(op.inserted), op.removed.length])).toEqual([[2, ['s1', 's2'], 0]]);
    expect(textsOf(apply(panes, ops)[1])).toEqual(['a', 'd1', 's1', 's2', 'c']);
  });

  it('skips rows where the destination already matches', () => {
    const panes = panesOf(['a', 's1', 's2', 'c'], ['a', 'd1', 'c']);
    expect(unwrap(operatorFor(panes).copyInto(0, 1, { startRow: 0, endRow: 1 }))).toEqual([]);
  });

  it('fails on empty ranges', () => {
    const panes = panesOf(['a', 'c'], ['a', 'b', 'c']);
    const result = operatorFor(panes).copyInto(0, 1, { startRow: 1, endRow: 2 });
    expect(result.ok).toBe(false);
  });
});

describe('MergeOperator.copyUp / copyDown', () => {
  const panes = panesOf(['a', 'b', 'c'], ['a', 'x', 'c']);

  it('inserts the source block above the destination block', () => {
    const ops = unwrap(operatorFor(panes).copyUp({ startRow: 1, endRow: 2 }, 0, 1));
    expect(textsOf(apply(panes, ops)[1])).toEqual(['a', 'b', 'x', 'c']);
  });

  it('inserts the source block below the destination block', () => {
    const ops = unwrap(operatorFor(panes).copyDown({ startRow: 1, endRow: 2 }, 0, 1));
    expect(textsOf(apply(panes, ops)[1])).toEqual(['a', 'x', 'b', 'c']);
  });
});

describe('MergeOperator.mergeAll', () => {
  it('lets the later source win a row both sources change', () => {
    const panes = panesOf(['1', '2'], ['1', 'X', '2'], ['1', 'Y', '2']);
    const operator = operatorFor(panes, 1);
    expect(textsOf(apply(panes, unwrap(operator.mergeFromLeftThenRight(1)))[1])).toEqual(['1', 'Y', '2']);
    expect(textsOf(apply(panes, unwrap(operator.mergeFromRightThenLeft(1)))[1])).toEqual(['1', '2']);
  });

  it('takes non-overlapping changes from both sides', () => {
    const panes = panesOf(['1', 'L', '2', '3'], ['1', '2', '3'], ['1', '2', 'R', '3']);
    const operator = operatorFor(panes, 1);
    const ops = unwrap(operator.mergeInOrder(MergeOrder.LEFT_THEN_RIGHT, 1));
    expect(ops.map((op) => op.start)).toEqual([2, 1]);
    expect(textsOf(apply(panes, ops)[1])).toEqual(['1', 'L', '2', 'R', '3']);
  });

  it('does nothing when every pane agrees', () => {
    const panes = panesOf(['a'], ['a'], ['a']);
    expect(unwrap(operatorFor(panes, 1).mergeFromLeftThenRight(1))).toEqual([]);
  });

  it('rejects invalid sources', () => {
    const operator = operatorFor(panesOf(['a'], ['b'], ['c']), 1);
    expect(operator.mergeAll([1], 1).ok).toBe(false);
    expect(operator.mergeAll([0, 0], 1).ok).toBe(false);
    expect(operator.mergeAll([], 1).ok).toBe(false);
    expect(operator.mergeAll([0], 5).ok).toBe(false);
  });
});
