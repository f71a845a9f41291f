import type { AlignmentTable, Cell } from '../types/align.js';
import type { DifferenceBlock } from '../types/diff.js';
import type { LineNormalizer } from '../types/equality.js';
import type { LineSequence } from '../types/line.js';
import { RowKind } from '../types/enums.js';

/** Compares cells of one row under the active policy; gaps equal gaps, and blank lines when blank lines are ignored. */
export class CellComparator {
  private readonly keys: (string | undefined)[][];

  constructor(
    private readonly panes: readonly LineSequence[],
    private readonly normalizer: LineNormalizer
  ) {
    this.keys = panes.map((lines) => new Array<string | undefined>(lines.length));
  }

  key(pane: number, cell: number): string {
    let key = this.keys[pane][cell];
    if (key === undefined) {
      key = this.normalizer.key(this.panes[pane][cell]);
      this.keys[pane][cell] = key;
    }
    return key;
  }

  blank(pane: number, cell: Cell): boolean {
    return cell !== null && this.normalizer.policy.ignoreBlankLines && this.normalizer.isBlank(this.panes[pane][cell]);
  }

  same(a: number, cellA: Cell, b: number, cellB: Cell): boolean {
    if (cellA === null && cellB === null) return true;
    if (cellA === null) return this.blank(b, cellB);
    if (cellB === null) return this.blank(a, cellA);
    return this.key(a, cellA) === this.key(b, cellB);
  }
}

export function classifyRow(cells: readonly Cell[], compare: CellComparator, referencePane: number): RowKind {
  const present: number[] = [];
  cells.forEach((cell, p) => {
    if (cell !== null) present.push(p);
  });
  if (present.every((p) => compare.blank(p, cells[p]))) return RowKind.SAME;
  if (present.length === cells.length) {
    const first = present[0];
    if (present.every((p) => compare.same(first, cells[first], p, cells[p]))) return RowKind.SAME;
    return RowKind.CHANGED;
  }
  if (cells[referencePane] === null) return RowKind.INSERTED;
  return RowKind.DELETED;
}

export function classify(
  table: AlignmentTable,
  panes: readonly LineSequence[],
  normalizer: LineNormalizer,
  referencePane: number
): DifferenceBlock[] {
  const compare = new CellComparator(panes, normalizer);
  const blocks: DifferenceBlock[] = [];
  let open: { startRow: number; kinds: Set<RowKind> } | null = null;

  const close = (endRow: number) => {
    if (!open) return;
    blocks.push(describeBlock(table, compare, referencePane, blocks.length, open.startRow, endRow, open.kinds));
    open = null;
  };

  table.rows.forEach((row, r) => {
    const kind = classifyRow(row.cells, compare, referencePane);
    if (kind === RowKind.SAME) {
      close(r);
      return;
    }
    if (!open) open = { startRow: r, kinds: new Set() };
    open.kinds.add(kind);
  });
  close(table.rows.length);
  return blocks;
}

function describeBlock(
  table: AlignmentTable,
  compare: CellComparator,
  referencePane: number,
  index: number,
  startRow: number,
  endRow: number,
  kinds: Set<RowKind>
): DifferenceBlock {
  const kind = kinds.size === 1 ? [...kinds][0] : RowKind.CHANGED;
  const differs = (a: number, b: number) => {
    for (let r = startRow; r < endRow; r += 1) {
      const cells = table.rows[r].cells;
      if (!compare.same(a, cells[a], b, cells[b])) return true;
    }
    return false;
  };
  const panes: number[] = [];
  for (let p = 0; p < table.paneCount; p += 1) {
    if (p !== referencePane && differs(referencePane, p)) panes.push(p);
  }
  let conflict = false;
  for (let i = 0; i < panes.length && !conflict; i += 1) {
    for (let j = i + 1; j < panes.length && !conflict; j += 1) {
      conflict = differs(panes[i], panes[j]);
    }
  }
  return { index, startRow, endRow, kind, panes, conflict };
}
