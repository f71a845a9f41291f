export enum ErrorCode {
  ALIGNMENT_ERROR = 'ALIGNMENT_ERROR',
  RANGE_ERROR = 'RANGE_ERROR',
  LOAD_ERROR = 'LOAD_ERROR',
  SAVE_ERROR = 'SAVE_ERROR',
  FETCH_ERROR = 'FETCH_ERROR',
  CANCELLED = 'CANCELLED',
  INVALID_COMMAND = 'INVALID_COMMAND',
  INVALID_FILTER = 'INVALID_FILTER',
  STATE_ERROR = 'STATE_ERROR'
}

export enum RowKind {
  SAME = 'SAME',
  CHANGED = 'CHANGED',
  INSERTED = 'INSERTED',
  DELETED = 'DELETED'
}

export enum SplitKind {
  PIN = 'PIN',
  CUT = 'CUT'
}

export enum DocumentState {
  CLEAN = 'CLEAN',
  EDITING = 'EDITING',
  DIRTY = 'DIRTY'
}

export enum NavigateDirection {
  FIRST = 'FIRST',
  PREVIOUS = 'PREVIOUS',
  NEXT = 'NEXT',
  LAST = 'LAST'
}

export enum MergeOrder {
  LEFT_THEN_RIGHT = 'LEFT_THEN_RIGHT',
  RIGHT_THEN_LEFT = 'RIGHT_THEN_LEFT'
}

export enum RealignMode {
  NONE = 'NONE',
  INCREMENTAL = 'INCREMENTAL',
  FULL = 'FULL',
  RESTORED = 'RESTORED'
}
