import type { Cell } from '../types/align.js';
import { matchAgainstReference } from './pairwise.js';

/**
 * Folds pairwise reference alignments into one grid over local line indices.
 *
 * Every reference line owns a row. Lines of another pane that match no
 * reference line fill the rows of the next unmatched reference lines in their
 * interval, top-aligned; whatever does not fit gets extra rows right before
 * the pane's next match.
 */
export function foldRows(keys: readonly (readonly string[])[], referencePane: number): Cell[][] {
  const paneCount = keys.length;
  const reference = keys[referencePane];
  const refLength = reference.length;

  // slot[p][i]: line of pane p shown on reference row i; overflow[p][i]: lines placed before reference row i.
  const slot: Cell[][] = [];
  const overflow: number[][][] = [];

  for (let p = 0; p < paneCount; p += 1) {
    const paneSlots = new Array<Cell>(refLength).fill(null);
    const paneOverflow: number[][] = Array.from({ length: refLength + 1 }, () => []);
    slot.push(paneSlots);
    overflow.push(paneOverflow);
    if (p === referencePane) {
      for (let i = 0; i < refLength; i += 1) paneSlots[i] = i;
      continue;
    }

    const other = keys[p];
    const matchOf = matchAgainstReference(reference, other);
    let prevRef = -1;
    let prevOther = -1;
    const place = (nextRef: number, nextOther: number) => {
      let target = prevRef + 1;
      for (let j = prevOther + 1; j < nextOther; j += 1) {
        if (target < nextRef) {
          paneSlots[target] = j;
          target += 1;
        } else {
          paneOverflow[nextRef].push(j);
        }
      }
    };
    for (let i = 0; i < refLength; i += 1) {
      const j = matchOf[i];
      if (j < 0) continue;
      place(i, j);
      paneSlots[i] = j;
      prevRef = i;
      prevOther = j;
    }
    place(refLength, other.length);
  }

  const rows: Cell[][] = [];
  for (let i = 0; i <= refLength; i += 1) {
    let extra = 0;
    for (let p = 0; p < paneCount; p += 1) extra = Math.max(extra, overflow[p][i].length);
    for (let k = 0; k < extra; k += 1) {
      const cells: Cell[] = [];
      for (let p = 0; p < paneCount; p += 1) cells.push(overflow[p][i][k] ?? null);
      rows.push(cells);
    }
    if (i === refLength) break;
    const cells: Cell[] = [];
    for (let p = 0; p < paneCount; p += 1) cells.push(slot[p][i]);
    rows.push(cells);
  }
  return rows;
}
