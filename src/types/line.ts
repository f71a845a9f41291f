import type { PaneId } from './ids.js';

export type Eol = '\n' | '\r\n' | '\r' | '';

export interface Line {
  readonly text: string;
  readonly eol: Eol;
  /** Zero-based line number at load time, `null` for lines introduced by an edit. */
  readonly origin: number | null;
  readonly modified: boolean;
}

export type LineSequence = readonly Line[];

export interface Pane {
  readonly paneId: PaneId;
  readonly label: string;
  lines: Line[];
  /** Content as of the last load or confirmed save. */
  saved: LineSequence;
  /** Content as of the last load or reload, restored by dismissAllEdits. */
  loaded: LineSequence;
  identity?: string;
}

export interface PaneView {
  paneId: PaneId;
  label: string;
  lines: LineSequence;
  dirty: boolean;
}
