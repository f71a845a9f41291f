import type { AlignmentTable, Cell } from './types/align.js';
import type { EqualityPolicy, LineNormalizer } from './types/equality.js';
import type { Line } from './types/line.js';
import { compileEquality, resolveEquality } from './equality/policy.js';
import { linesFrom } from './text/lines.js';

export function panesOf(...texts: string[][]): Line[][] {
  return texts.map((pane) => linesFrom(pane));
}

export function normalizerOf(partial: Partial<EqualityPolicy> = {}): LineNormalizer {
  const compiled = compileEquality(resolveEquality(partial));
  if (!compiled.ok) throw new Error(compiled.error.message);
  return compiled.value;
}

export function gridOf(table: AlignmentTable): Cell[][] {
  return table.rows.map((row) => [...row.cells]);
}

/** Returns the first broken table invariant, or null. */
export function tableViolation(table: AlignmentTable, lineCounts: readonly number[]): string | null {
  const next = lineCounts.map(() => 0);
  for (let r = 0; r < table.rows.length; r += 1) {
    const cells = table.rows[r].cells;
    if (cells.length !== lineCounts.length) return `row ${r} has ${cells.length} cells`;
    if (cells.every((cell) => cell === null)) return `row ${r} is empty`;
    for (let p = 0; p < cells.length; p += 1) {
      const cell = cells[p];
      if (cell === null) continue;
      if (cell !== next[p]) return `row ${r} pane ${p} holds ${cell}, expected ${next[p]}`;
      next[p] += 1;
    }
  }
  for (let p = 0; p < lineCounts.length; p += 1) {
    if (next[p] !== lineCounts[p]) return `pane ${p} covers ${next[p]} of ${lineCounts[p]} lines`;
  }
  return null;
}
