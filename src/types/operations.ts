import type { TransactionId } from './ids.js';
import type { Line } from './line.js';
import type { AlignmentTable, SplitPoint } from './align.js';

export enum OpType {
  REPLACE_LINES = 'REPLACE_LINES',
  SET_SPLITS = 'SET_SPLITS'
}

export interface ReplaceLinesOp {
  type: OpType.REPLACE_LINES;
  pane: number;
  start: number;
  removed: readonly Line[];
  inserted: readonly Line[];
}

export interface SetSplitsOp {
  type: OpType.SET_SPLITS;
  before: readonly SplitPoint[];
  after: readonly SplitPoint[];
}

export type EditOperation = ReplaceLinesOp | SetSplitsOp;

export interface Transaction {
  id: TransactionId;
  label: string;
  operations: EditOperation[];
  tableBefore: AlignmentTable;
  tableAfter: AlignmentTable;
  /** Equality/reference configuration the stored tables were computed under. */
  configVersion: number;
}

export interface OperationTarget {
  apply(op: EditOperation): void;
}
