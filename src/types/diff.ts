import type { RowKind } from './enums.js';

export interface DifferenceBlock {
  index: number;
  startRow: number;
  endRow: number;
  kind: RowKind;
  /** Panes whose content differs from the reference pane inside the block. */
  panes: number[];
  conflict: boolean;
}

export interface NavigationResult {
  block: DifferenceBlock | null;
  wrapped: boolean;
}
