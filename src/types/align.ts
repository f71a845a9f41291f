import type { SplitKind } from './enums.js';
import type { Result } from './error.js';
import type { LineNormalizer } from './equality.js';
import type { LineSequence } from './line.js';

export type Cell = number | null;

export interface AlignmentRow {
  readonly cells: readonly Cell[];
}

export interface AlignmentTable {
  readonly paneCount: number;
  readonly rows: readonly AlignmentRow[];
  /** Row index of each pin, in split order. */
  readonly pinRows: readonly number[];
}

export interface Pin {
  readonly cells: readonly Cell[];
  readonly cuts: readonly number[];
}

/**
 * Ordered partition element. A PIN forces `cells` into one row; a CUT only
 * separates the lines before `cuts` from the lines after.
 */
export interface SplitPoint extends Pin {
  readonly kind: SplitKind;
}

export interface RowRange {
  startRow: number;
  endRow: number;
}

export interface LineEdit {
  pane: number;
  start: number;
  removed: number;
  inserted: number;
}

export interface AlignOptions {
  referencePane: number;
  signal?: AbortSignal;
}

export interface IncrementalAlignment {
  table: AlignmentTable;
  recomputed: RowRange;
}

export interface Aligner {
  compute(panes: readonly LineSequence[], splits: readonly SplitPoint[], normalizer: LineNormalizer, options: AlignOptions): Result<AlignmentTable>;
  computeIncremental(
    previous: AlignmentTable,
    panes: readonly LineSequence[],
    splits: readonly SplitPoint[],
    edit: LineEdit,
    normalizer: LineNormalizer,
    options: AlignOptions
  ): Result<IncrementalAlignment>;
}
