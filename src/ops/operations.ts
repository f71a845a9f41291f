import type { EditOperation, ReplaceLinesOp, SetSplitsOp } from '../types/operations.js';
import type { SplitPoint } from '../types/align.js';
import type { Line } from '../types/line.js';
import { OpType } from '../types/operations.js';
import { dominantEol } from '../text/lines.js';

export function replaceLines(pane: number, start: number, removed: readonly Line[], inserted: readonly Line[]): ReplaceLinesOp {
  return { type: OpType.REPLACE_LINES, pane, start, removed: [...removed], inserted: [...inserted] };
}

export function invert(op: EditOperation): EditOperation {
  switch (op.type) {
    case OpType.REPLACE_LINES:
      return { type: OpType.REPLACE_LINES, pane: op.pane, start: op.start, removed: op.inserted, inserted: op.removed };
    case OpType.SET_SPLITS:
      return { type: OpType.SET_SPLITS, before: op.after, after: op.before };
  }
}

/** Applies a line replacement to `lines` in place. */
export function spliceLines(lines: Line[], op: ReplaceLinesOp): void {
  lines.splice(op.start, op.removed.length, ...op.inserted);
}

/** Line delta of a replacement, as seen by the aligner. */
export function lineEditOf(op: ReplaceLinesOp): { pane: number; start: number; removed: number; inserted: number } {
  return { pane: op.pane, start: op.start, removed: op.removed.length, inserted: op.inserted.length };
}

export function sameLines(a: readonly Line[], b: readonly Line[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i].text !== b[i].text || a[i].eol !== b[i].eol) return false;
  }
  return true;
}

export function setSplits(before: readonly SplitPoint[], after: readonly SplitPoint[]): SetSplitsOp {
  return { type: OpType.SET_SPLITS, before: [...before], after: [...after] };
}

export function isReplace(op: EditOperation): op is ReplaceLinesOp {
  return op.type === OpType.REPLACE_LINES;
}

/** Terminates every line of `lines` that lacks an eol but is no longer the last one. */
export function eolRepairs(pane: number, lines: readonly Line[]): ReplaceLinesOp[] {
  const repairs: ReplaceLinesOp[] = [];
  const eol = dominantEol(lines);
  for (let i = 0; i < lines.length - 1; i += 1) {
    const line = lines[i];
    if (line.eol === '') repairs.push(replaceLines(pane, i, [line], [{ ...line, eol, modified: true }]));
  }
  return repairs;
}
