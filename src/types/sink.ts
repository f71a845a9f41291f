import type { CoreError } from './error.js';
import type { Command, CommandResult } from './commands.js';
import type { RealignMode } from './enums.js';
import type { RowRange } from './align.js';

export interface RealignInfo {
  mode: RealignMode;
  generation: number;
  rows: number;
  recomputed: RowRange | null;
}

export interface DocumentSink {
  onCommandStarted(command: Command): void;
  onCommandFinished(command: Command, result: CommandResult): void;
  onRealigned(info: RealignInfo): void;
  onError(err: CoreError): void;
}
