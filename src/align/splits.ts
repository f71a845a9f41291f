import type { AlignmentTable, Cell, SplitPoint } from '../types/align.js';
import type { LineEdit } from '../types/align.js';
import { SplitKind } from '../types/enums.js';

/** First line of each pane after the split point. */
export function splitEnd(split: SplitPoint, pane: number): number {
  const cell = split.cells[pane];
  return cell === null ? split.cuts[pane] : cell + 1;
}

export function makePin(cells: readonly Cell[], cuts: readonly number[]): SplitPoint {
  return { kind: SplitKind.PIN, cells: [...cells], cuts: [...cuts] };
}

export function makeCut(cuts: readonly number[]): SplitPoint {
  return { kind: SplitKind.CUT, cells: cuts.map(() => null), cuts: [...cuts] };
}

/**
 * Returns a description of the first violation, or null when the splits are
 * well-formed, in range and monotonic across every pane.
 */
export function checkSplits(splits: readonly SplitPoint[], lineCounts: readonly number[]): string | null {
  const paneCount = lineCounts.length;
  let previous: SplitPoint | undefined;
  for (let k = 0; k < splits.length; k += 1) {
    const split = splits[k];
    if (split.cells.length !== paneCount || split.cuts.length !== paneCount) {
      return `split ${k} covers ${split.cuts.length} panes, expected ${paneCount}`;
    }
    let pinned = 0;
    for (let p = 0; p < paneCount; p += 1) {
      const cut = split.cuts[p];
      const cell = split.cells[p];
      if (!Number.isInteger(cut) || cut < 0 || cut > lineCounts[p]) {
        return `split ${k} cuts pane ${p} at ${cut}, outside 0..${lineCounts[p]}`;
      }
      if (cell !== null) {
        if (split.kind === SplitKind.CUT) return `cut ${k} pins pane ${p}`;
        if (cell !== cut || cell >= lineCounts[p]) return `pin ${k} names line ${cell} of pane ${p} inconsistently`;
        pinned += 1;
      }
      if (previous && splitEnd(previous, p) > cut) {
        return `split ${k} precedes split ${k - 1} in pane ${p}`;
      }
    }
    if (split.kind === SplitKind.PIN && pinned === 0) return `pin ${k} names no line`;
    previous = split;
  }
  return null;
}

/** Inserts `split` at the first position that keeps the list monotonic. */
export function insertSplit(splits: readonly SplitPoint[], split: SplitPoint, lineCounts: readonly number[]): SplitPoint[] | null {
  for (let at = 0; at <= splits.length; at += 1) {
    const candidate = [...splits.slice(0, at), split, ...splits.slice(at)];
    if (checkSplits(candidate, lineCounts) === null) return candidate;
  }
  return null;
}

/**
 * Moves split points across a line replacement in one pane. Pins whose pinned
 * line was replaced are dropped; cuts inside the replaced range snap to its start.
 */
export function shiftSplits(splits: readonly SplitPoint[], edit: LineEdit): SplitPoint[] {
  const { pane, start, removed, inserted } = edit;
  const delta = inserted - removed;
  const shift = (index: number) => (index >= start + removed ? index + delta : index);
  const shifted: SplitPoint[] = [];
  for (const split of splits) {
    const cell = split.cells[pane];
    const cut = split.cuts[pane];
    if (cell !== null && cell >= start && cell < start + removed) continue;
    const nextCut = cell !== null ? shift(cell) : cut > start && cut < start + removed ? start : shift(cut);
    const cells = split.cells.map((c, p) => (p === pane && c !== null ? shift(c) : c));
    const cuts = split.cuts.map((c, p) => (p === pane ? nextCut : c));
    shifted.push({ kind: split.kind, cells, cuts });
  }
  return shifted;
}

/** Row index of every pin in `table`, or null when a pin row is missing. */
export function locatePins(rows: AlignmentTable['rows'], splits: readonly SplitPoint[]): number[] | null {
  const pinRows: number[] = [];
  let cursor = 0;
  for (const split of splits) {
    if (split.kind !== SplitKind.PIN) continue;
    while (cursor < rows.length && !sameCells(rows[cursor].cells, split.cells)) cursor += 1;
    if (cursor === rows.length) return null;
    pinRows.push(cursor);
    cursor += 1;
  }
  return pinRows;
}

function sameCells(a: readonly Cell[], b: readonly Cell[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function sameSplits(a: readonly SplitPoint[], b: readonly SplitPoint[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((split, k) => split.kind === b[k].kind && sameCells(split.cells, b[k].cells) && sameCells(split.cuts, b[k].cuts));
}

/** Number of lines of each pane placed in rows before `row`. */
export function cutsBeforeRow(table: AlignmentTable, row: number): number[] {
  const cuts = new Array<number>(table.paneCount).fill(0);
  const limit = Math.min(row, table.rows.length);
  for (let r = 0; r < limit; r += 1) {
    table.rows[r].cells.forEach((cell, p) => {
      if (cell !== null) cuts[p] = cell + 1;
    });
  }
  return cuts;
}
