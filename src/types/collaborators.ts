import type { Result } from './error.js';
import type { LineSequence } from './line.js';
import type { PaneId } from './ids.js';
import type { AlignmentTable } from './align.js';

export interface LoadedSource {
  label: string;
  lines: LineSequence;
  /** Opaque modification stamp used to detect external changes. */
  identity?: string;
}

export interface Loader<S> {
  load(source: S): Result<LoadedSource>;
  identity?(source: S): Result<string | undefined>;
}

export interface Revision {
  id: string;
  label: string;
  date?: string;
}

export interface VcsCollaborator {
  listRevisions(path: string): Result<Revision[]>;
  fetch(path: string, revision: Revision): Result<LoadedSource>;
}

export interface SavePayload {
  paneId: PaneId;
  label: string;
  text: string;
  lines: LineSequence;
  dirty: boolean;
}

export interface PersistenceCollaborator {
  /** Confirms a write with `ok`, carrying the new modification stamp when the target has one. */
  save(payload: SavePayload): Result<string | undefined>;
}

export interface HighlightCollaborator {
  highlight(table: AlignmentTable, pane: number, lines: LineSequence): void;
}
