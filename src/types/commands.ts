import type { MergeOrder, NavigateDirection, DocumentState } from './enums.js';
import type { CoreError } from './error.js';
import type { EqualityPolicy } from './equality.js';
import type { PaneView } from './line.js';
import type { AlignmentTable, RowRange } from './align.js';
import type { DifferenceBlock, NavigationResult } from './diff.js';

export interface PinAnchor {
  pane: number;
  line: number;
}

export type Command =
  | { type: 'edit'; pane: number; start: number; deleteCount: number; lines: string[] }
  | { type: 'pin'; anchors: PinAnchor[] }
  | { type: 'unpin'; row: number }
  | { type: 'isolate'; startRow: number; endRow: number }
  | { type: 'realignAll' }
  | { type: 'navigate'; direction: NavigateDirection }
  | { type: 'copySelection'; block: number; src: number; dst: number }
  | { type: 'copyInto'; src: number; dst: number; startRow: number; endRow: number }
  | { type: 'copyUp'; block: number; src: number; dst: number }
  | { type: 'copyDown'; block: number; src: number; dst: number }
  | { type: 'mergeAll'; order: MergeOrder; dst: number }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'dismissAllEdits' }
  | { type: 'setEquality'; policy: Partial<EqualityPolicy> }
  | { type: 'setReferencePane'; pane: number };

export type CommandType = Command['type'];

export interface ViewState {
  state: DocumentState;
  generation: number;
  referencePane: number;
  table: AlignmentTable;
  blocks: readonly DifferenceBlock[];
  currentBlock: DifferenceBlock | null;
  panes: PaneView[];
  canUndo: boolean;
  canRedo: boolean;
}

export type CommandResult =
  | { ok: true; view: ViewState; affectedRows: RowRange | null; navigation?: NavigationResult }
  | { ok: false; error: CoreError };
