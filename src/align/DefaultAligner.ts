import type {
  Aligner,
  AlignmentRow,
  AlignmentTable,
  AlignOptions,
  Cell,
  IncrementalAlignment,
  LineEdit,
  SplitPoint
} from '../types/align.js';
import type { LineNormalizer } from '../types/equality.js';
import type { LineSequence } from '../types/line.js';
import type { Result } from '../types/error.js';
import { ErrorCode, SplitKind } from '../types/enums.js';
import { fail, ok } from '../utils/errors.js';
import { foldRows } from './fold.js';
import { checkSplits, locatePins, splitEnd } from './splits.js';

interface Solved {
  rows: AlignmentRow[];
  pinRows: number[];
}

/** Line keys per pane, normalised lazily so incremental passes only touch the lines they align. */
class KeyCache {
  private readonly cache: (string | undefined)[][];

  constructor(
    private readonly panes: readonly LineSequence[],
    private readonly normalizer: LineNormalizer
  ) {
    this.cache = panes.map((lines) => new Array<string | undefined>(lines.length));
  }

  slice(pane: number, from: number, to: number): string[] {
    const lines = this.panes[pane];
    const cached = this.cache[pane];
    const out: string[] = [];
    for (let i = from; i < to; i += 1) {
      let key = cached[i];
      if (key === undefined) {
        key = this.normalizer.key(lines[i]);
        cached[i] = key;
      }
      out.push(key);
    }
    return out;
  }

  key(pane: number, line: number): string {
    return this.slice(pane, line, line + 1)[0];
  }
}

export class DefaultAligner implements Aligner {
  compute(panes: readonly LineSequence[], splits: readonly SplitPoint[], normalizer: LineNormalizer, options: AlignOptions): Result<AlignmentTable> {
    const precheck = this.precheck<AlignmentTable>(panes, splits, options);
    if (precheck) return precheck;
    const keys = new KeyCache(panes, normalizer);
    const from = panes.map(() => 0);
    const to = panes.map((lines) => lines.length);
    const solved = this.solve(keys, from, to, splits, options);
    if (!solved) return fail(ErrorCode.CANCELLED, 'Alignment was cancelled');
    return ok({ paneCount: panes.length, rows: solved.rows, pinRows: solved.pinRows });
  }

  computeIncremental(
    previous: AlignmentTable,
    panes: readonly LineSequence[],
    splits: readonly SplitPoint[],
    edit: LineEdit,
    normalizer: LineNormalizer,
    options: AlignOptions
  ): Result<IncrementalAlignment> {
    const precheck = this.precheck<IncrementalAlignment>(panes, splits, options);
    if (precheck) return precheck;
    if (previous.paneCount !== panes.length || edit.pane < 0 || edit.pane >= panes.length) {
      return fail(ErrorCode.ALIGNMENT_ERROR, 'Edit does not match the previous alignment');
    }
    const full = () => {
      const table = this.compute(panes, splits, normalizer, options);
      return table.ok ? ok({ table: table.value, recomputed: { startRow: 0, endRow: table.value.rows.length } }) : table;
    };

    const keys = new KeyCache(panes, normalizer);
    const rows = previous.rows;
    const { pane, start, removed, inserted } = edit;
    const delta = inserted - removed;
    const oldCount = panes[pane].length - delta;
    const mapCell = (p: number, cell: Cell): Cell => (cell !== null && p === pane && cell >= start + removed ? cell + delta : cell);

    const rowOfLine = new Map<number, number>();
    rows.forEach((row, r) => {
      const cell = row.cells[pane];
      if (cell === start - 1 || cell === start + removed) rowOfLine.set(cell, r);
    });
    const before = start > 0 ? rowOfLine.get(start - 1) : -1;
    const after = start + removed < oldCount ? rowOfLine.get(start + removed) : rows.length;
    if (before === undefined || after === undefined) return full();

    const livePins = new Set<string>();
    for (const split of splits) {
      if (split.kind === SplitKind.PIN) livePins.add(split.cells.join(','));
    }
    const pinRowSet = new Set(previous.pinRows);
    const isAnchor = (r: number): boolean => {
      const cells = rows[r].cells.map((cell, p) => mapCell(p, cell));
      if (pinRowSet.has(r) && livePins.has(cells.join(','))) return true;
      let first: string | undefined;
      for (let p = 0; p < cells.length; p += 1) {
        const cell = cells[p];
        if (cell === null) return false;
        const key = keys.key(p, cell);
        if (first === undefined) first = key;
        else if (key !== first) return false;
      }
      return true;
    };

    let lo = before;
    while (lo >= 0 && !isAnchor(lo)) lo -= 1;
    let hi = after;
    while (hi < rows.length && !isAnchor(hi)) hi += 1;

    const from = panes.map(() => 0);
    const to = panes.map((lines) => lines.length);
    for (let p = 0; p < panes.length; p += 1) {
      for (let r = lo; r >= 0; r -= 1) {
        const cell = rows[r].cells[p];
        if (cell !== null) {
          from[p] = cell + 1;
          break;
        }
      }
      for (let r = hi; r < rows.length; r += 1) {
        const cell = mapCell(p, rows[r].cells[p]);
        if (cell !== null) {
          to[p] = cell;
          break;
        }
      }
      if (from[p] > to[p]) return full();
    }

    const inner = splits.filter((split) =>
      split.cuts.every((cut, p) => {
        const cell = split.cells[p];
        return cut >= from[p] && splitEnd(split, p) <= to[p] && (cell === null || cell >= from[p]);
      })
    );
    const straddles = splits.some(
      (split) =>
        !inner.includes(split) &&
        !split.cuts.every((_, p) => splitEnd(split, p) <= from[p]) &&
        !split.cuts.every((cut, p) => cut >= to[p])
    );
    if (straddles) return full();
    const solved = this.solve(keys, from, to, inner, options);
    if (!solved) return fail(ErrorCode.CANCELLED, 'Alignment was cancelled');

    const suffix = rows.slice(Math.max(hi, 0)).map((row) => ({ cells: row.cells.map((cell, p) => mapCell(p, cell)) }));
    const nextRows = [...rows.slice(0, lo + 1), ...solved.rows, ...suffix];
    const pinRows = locatePins(nextRows, splits);
    if (!pinRows) return full();
    return ok({
      table: { paneCount: panes.length, rows: nextRows, pinRows },
      recomputed: { startRow: lo + 1, endRow: lo + 1 + solved.rows.length }
    });
  }

  private precheck<T>(panes: readonly LineSequence[], splits: readonly SplitPoint[], options: AlignOptions): Result<T> | null {
    if (panes.length < 2) return fail(ErrorCode.ALIGNMENT_ERROR, `At least two panes are required, got ${panes.length}`);
    if (!Number.isInteger(options.referencePane) || options.referencePane < 0 || options.referencePane >= panes.length) {
      return fail(ErrorCode.ALIGNMENT_ERROR, `Reference pane ${options.referencePane} is out of range`);
    }
    const violation = checkSplits(
      splits,
      panes.map((lines) => lines.length)
    );
    if (violation) return fail(ErrorCode.ALIGNMENT_ERROR, `Contradictory split points: ${violation}`);
    if (options.signal?.aborted) return fail(ErrorCode.CANCELLED, 'Alignment was cancelled');
    return null;
  }

  /** Solves each open range between consecutive splits; null when cancelled. */
  private solve(keys: KeyCache, from: number[], to: number[], splits: readonly SplitPoint[], options: AlignOptions): Solved | null {
    const rows: AlignmentRow[] = [];
    const pinRows: number[] = [];
    let cursor = [...from];
    for (const split of splits) {
      if (options.signal?.aborted) return null;
      this.solveOpen(keys, cursor, split.cuts, options.referencePane, rows);
      if (split.kind === SplitKind.PIN) {
        pinRows.push(rows.length);
        rows.push({ cells: [...split.cells] });
      }
      cursor = cursor.map((_, p) => splitEnd(split, p));
    }
    if (options.signal?.aborted) return null;
    this.solveOpen(keys, cursor, to, options.referencePane, rows);
    return { rows, pinRows };
  }

  private solveOpen(keys: KeyCache, from: readonly number[], to: readonly number[], referencePane: number, out: AlignmentRow[]): void {
    const slices = from.map((start, p) => keys.slice(p, start, to[p]));
    if (slices.every((slice) => slice.length === 0)) return;
    for (const cells of foldRows(slices, referencePane)) {
      out.push({ cells: cells.map((cell, p) => (cell === null ? null : cell + from[p])) });
    }
  }
}
