import type { AlignmentTable } from '../types/align.js';
import type { DifferenceBlock, NavigationResult } from '../types/diff.js';
import type { LineNormalizer } from '../types/equality.js';
import type { LineSequence } from '../types/line.js';
import { NavigateDirection } from '../types/enums.js';
import { classify } from './classify.js';

const NOWHERE: NavigationResult = { block: null, wrapped: false };

export class DifferenceIndex {
  readonly blocks: readonly DifferenceBlock[];

  constructor(blocks: readonly DifferenceBlock[]) {
    this.blocks = blocks;
  }

  static build(table: AlignmentTable, panes: readonly LineSequence[], normalizer: LineNormalizer, referencePane: number): DifferenceIndex {
    return new DifferenceIndex(classify(table, panes, normalizer, referencePane));
  }

  get size(): number {
    return this.blocks.length;
  }

  first(): NavigationResult {
    return this.at(0, false);
  }

  last(): NavigationResult {
    return this.at(this.blocks.length - 1, false);
  }

  next(current: DifferenceBlock | null): NavigationResult {
    if (!current) return this.first();
    const index = this.blocks.findIndex((block) => block.startRow > current.startRow);
    return index >= 0 ? this.at(index, false) : this.at(0, true);
  }

  previous(current: DifferenceBlock | null): NavigationResult {
    if (!current) return this.last();
    let index = -1;
    for (let i = this.blocks.length - 1; i >= 0; i -= 1) {
      if (this.blocks[i].startRow < current.startRow) {
        index = i;
        break;
      }
    }
    return index >= 0 ? this.at(index, false) : this.at(this.blocks.length - 1, true);
  }

  navigate(direction: NavigateDirection, current: DifferenceBlock | null): NavigationResult {
    switch (direction) {
      case NavigateDirection.FIRST:
        return this.first();
      case NavigateDirection.LAST:
        return this.last();
      case NavigateDirection.NEXT:
        return this.next(current);
      case NavigateDirection.PREVIOUS:
        return this.previous(current);
      default:
        return NOWHERE;
    }
  }

  /** Block containing `row`, if any. */
  blockAtRow(row: number): DifferenceBlock | null {
    return this.blocks.find((block) => row >= block.startRow && row < block.endRow) ?? null;
  }

  /** Block starting at or after `row`, used to carry the cursor across realignments. */
  blockFrom(row: number): DifferenceBlock | null {
    return this.blockAtRow(row) ?? this.blocks.find((block) => block.startRow >= row) ?? null;
  }

  private at(index: number, wrapped: boolean): NavigationResult {
    const block = this.blocks[index];
    return block ? { block, wrapped } : NOWHERE;
  }
}
