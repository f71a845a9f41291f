import type { AlignmentTable, Cell, RowRange } from '../types/align.js';
import type { LineNormalizer } from '../types/equality.js';
import type { Line, LineSequence } from '../types/line.js';
import type { ReplaceLinesOp } from '../types/operations.js';
import type { Result } from '../types/error.js';
import { MergeOrder } from '../types/enums.js';
import { ok, rangeError } from '../utils/errors.js';
import { cutsBeforeRow } from '../align/splits.js';
import { CellComparator } from '../diff/classify.js';
import { editedLine, fitInserted } from '../text/lines.js';
import { replaceLines, sameLines } from '../ops/operations.js';

export interface MergeContext {
  table: AlignmentTable;
  panes: readonly LineSequence[];
  normalizer: LineNormalizer;
}

interface Span {
  start: number;
  lines: Line[];
}

/**
 * Builds pane replacements for merge commands. Nothing here mutates; the
 * returned operations are ordered bottom-up so they can be applied in sequence.
 */
export class MergeOperator {
  private readonly compare: CellComparator;

  constructor(private readonly context: MergeContext) {
    this.compare = new CellComparator(context.panes, context.normalizer);
  }

  copySelection(block: RowRange, src: number, dst: number): Result<ReplaceLinesOp[]> {
    const invalid = this.validate(block, src, dst);
    if (invalid) return invalid;
    const source = this.linesOf(block, src);
    if (source.lines.length === 0) return rangeError(`Pane ${src} has no lines in rows ${block.startRow}..${block.endRow}`);
    const target = this.linesOf(block, dst);
    if (sameLines(source.lines, target.lines)) return ok([]);
    return ok([this.replace(dst, target.start, target.lines, source.lines)]);
  }

  copyInto(src: number, dst: number, range: RowRange): Result<ReplaceLinesOp[]> {
    const invalid = this.validate(range, src, dst);
    if (invalid) return invalid;
    if (this.linesOf(range, src).lines.length === 0) {
      return rangeError(`Pane ${src} has no lines in rows ${range.startRow}..${range.endRow}`);
    }
    const inserts: Span[] = [];
    let position = cutsBeforeRow(this.context.table, range.startRow)[dst];
    let pendingRow = -2;
    for (let r = range.startRow; r < range.endRow; r += 1) {
      const cells = this.context.table.rows[r].cells;
      const dstCell = cells[dst];
      const srcCell = cells[src];
      if (dstCell !== null) position = dstCell + 1;
      if (srcCell === null || this.compare.same(src, srcCell, dst, dstCell)) continue;
      const line = this.context.panes[src][srcCell];
      const open = inserts[inserts.length - 1];
      if (open && open.start === position && pendingRow === r - 1) {
        open.lines.push(line);
      } else {
        inserts.push({ start: position, lines: [line] });
      }
      pendingRow = r;
    }
    return ok(inserts.reverse().map((span) => this.replace(dst, span.start, [], span.lines)));
  }

  copyUp(block: RowRange, src: number, dst: number): Result<ReplaceLinesOp[]> {
    return this.copyBeside(block, src, dst, 'up');
  }

  copyDown(block: RowRange, src: number, dst: number): Result<ReplaceLinesOp[]> {
    return this.copyBeside(block, src, dst, 'down');
  }

  /**
   * Writes every row where a source differs from dst's current content into
   * dst, one source after another; a later source wins rows both touch.
   */
  mergeAll(sources: readonly number[], dst: number): Result<ReplaceLinesOp[]> {
    if (!this.isPane(dst)) return rangeError(`Pane index out of range: ${dst}`);
    if (sources.length === 0 || new Set(sources).size !== sources.length || sources.some((p) => p === dst || !this.isPane(p))) {
      return rangeError(`Invalid merge sources ${sources.join(',')} for pane ${dst}`);
    }

    const rows = this.context.table.rows;
    const ops: ReplaceLinesOp[] = [];
    let run: { start: number; removed: Line[]; inserted: Line[] } | null = null;
    let position = 0;
    const flush = () => {
      if (run && !sameLines(run.removed, run.inserted)) ops.push(this.replace(dst, run.start, run.removed, run.inserted));
      run = null;
    };

    for (let r = 0; r < rows.length; r += 1) {
      const cells = rows[r].cells;
      const dstCell = cells[dst];
      let chosen: Cell = dstCell;
      let chosenPane = dst;
      for (const src of sources) {
        if (!this.compare.same(src, cells[src], dst, dstCell)) {
          chosen = cells[src];
          chosenPane = src;
        }
      }
      if (chosenPane === dst) {
        flush();
      } else {
        if (!run) run = { start: position, removed: [], inserted: [] };
        if (dstCell !== null) run.removed.push(this.context.panes[dst][dstCell]);
        if (chosen !== null) run.inserted.push(this.context.panes[chosenPane][chosen]);
      }
      if (dstCell !== null) position = dstCell + 1;
    }
    flush();
    return ok(ops.reverse());
  }

  mergeFromLeftThenRight(dst: number): Result<ReplaceLinesOp[]> {
    return this.mergeInOrder(MergeOrder.LEFT_THEN_RIGHT, dst);
  }

  mergeFromRightThenLeft(dst: number): Result<ReplaceLinesOp[]> {
    return this.mergeInOrder(MergeOrder.RIGHT_THEN_LEFT, dst);
  }

  mergeInOrder(order: MergeOrder, dst: number): Result<ReplaceLinesOp[]> {
    const sources: number[] = [];
    for (let p = 0; p < this.context.panes.length; p += 1) {
      if (p !== dst) sources.push(p);
    }
    return this.mergeAll(order === MergeOrder.LEFT_THEN_RIGHT ? sources : sources.reverse(), dst);
  }

  private copyBeside(block: RowRange, src: number, dst: number, side: 'up' | 'down'): Result<ReplaceLinesOp[]> {
    const invalid = this.validate(block, src, dst);
    if (invalid) return invalid;
    const source = this.linesOf(block, src);
    if (source.lines.length === 0) return rangeError(`Pane ${src} has no lines in rows ${block.startRow}..${block.endRow}`);
    const target = this.linesOf(block, dst);
    const start = side === 'up' ? target.start : target.start + target.lines.length;
    return ok([this.replace(dst, start, [], source.lines)]);
  }

  private replace(dst: number, start: number, removed: readonly Line[], copied: readonly Line[]): ReplaceLinesOp {
    const fresh = copied.map((line) => editedLine(line.text, line.eol));
    return replaceLines(dst, start, removed, fitInserted(this.context.panes[dst], start, removed.length, fresh));
  }

  /** Lines of `pane` in the row range and the pane index where they start (or would be inserted). */
  private linesOf(range: RowRange, pane: number): Span {
    const lines: Line[] = [];
    let start: number | null = null;
    for (let r = range.startRow; r < range.endRow; r += 1) {
      const cell = this.context.table.rows[r].cells[pane];
      if (cell === null) continue;
      if (start === null) start = cell;
      lines.push(this.context.panes[pane][cell]);
    }
    return { start: start ?? cutsBeforeRow(this.context.table, range.startRow)[pane], lines };
  }

  private validate(range: RowRange, src: number, dst: number): Result<ReplaceLinesOp[]> | null {
    if (!this.isPane(src) || !this.isPane(dst)) return rangeError(`Pane index out of range: ${src} -> ${dst}`);
    if (src === dst) return rangeError(`Cannot copy pane ${src} onto itself`);
    const rows = this.context.table.rows.length;
    const { startRow, endRow } = range;
    if (!Number.isInteger(startRow) || !Number.isInteger(endRow) || startRow < 0 || endRow > rows || startRow >= endRow) {
      return rangeError(`Rows ${startRow}..${endRow} are outside the table of ${rows} rows`);
    }
    return null;
  }

  private isPane(pane: number): boolean {
    return Number.isInteger(pane) && pane >= 0 && pane < this.context.panes.length;
  }
}
