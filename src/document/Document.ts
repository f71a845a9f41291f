import type { Aligner, AlignmentTable, Cell, RowRange, SplitPoint } from '../types/align.js';
import type { Command, CommandResult, PinAnchor, ViewState } from '../types/commands.js';
import type { HighlightCollaborator, LoadedSource, Loader, PersistenceCollaborator, SavePayload } from '../types/collaborators.js';
import type { DifferenceBlock } from '../types/diff.js';
import type { EqualityPolicy, LineNormalizer } from '../types/equality.js';
import type { CoreError, Result } from '../types/error.js';
import type { TransactionId } from '../types/ids.js';
import type { Line, Pane } from '../types/line.js';
import type { EditOperation, ReplaceLinesOp, Transaction } from '../types/operations.js';
import type { DocumentSink } from '../types/sink.js';
import { DocumentState, ErrorCode, NavigateDirection, RealignMode, SplitKind } from '../types/enums.js';
import { OpType } from '../types/operations.js';
import { DefaultAligner } from '../align/DefaultAligner.js';
import { cutsBeforeRow, insertSplit, makeCut, makePin, sameSplits, shiftSplits } from '../align/splits.js';
import { DifferenceIndex } from '../diff/DifferenceIndex.js';
import { compileEquality, resolveEquality } from '../equality/policy.js';
import { MergeOperator } from '../merge/MergeOperator.js';
import { eolRepairs, invert, isReplace, lineEditOf, replaceLines, sameLines, setSplits, spliceLines } from '../ops/operations.js';
import { dominantEol, editedLine, fitInserted, joinLines } from '../text/lines.js';
import { callCollaborator } from '../collab/errorMapper.js';
import { createId, createSequence } from '../utils/id.js';
import { fail, makeError, ok, rangeError } from '../utils/errors.js';
import { UndoStack } from './UndoStack.js';

export interface DocumentOptions {
  equality: Partial<EqualityPolicy>;
  referencePane: number;
  /** Oldest transactions beyond this depth are dropped. */
  undoLimit: number;
  /** Realign single-pane edits between the nearest stable rows instead of recomputing the table. */
  incremental: boolean;
  aligner: Aligner;
  sink: DocumentSink;
}

export const NOOP_DOCUMENT_SINK: DocumentSink = {
  onCommandStarted() {},
  onCommandFinished() {},
  onRealigned() {},
  onError() {}
};

export const DEFAULT_DOCUMENT_OPTIONS: DocumentOptions = {
  equality: {},
  referencePane: 0,
  undoLimit: 500,
  incremental: true,
  aligner: new DefaultAligner(),
  sink: NOOP_DOCUMENT_SINK
};

/** Table computed off the command path; installed only if nothing changed since. */
export interface PendingRealign {
  readonly generation: number;
  readonly result: Result<AlignmentTable>;
}

interface OpenTransaction {
  id: TransactionId;
  label: string;
  operations: EditOperation[];
  tableBefore: AlignmentTable;
}

interface Realigned {
  table: AlignmentTable;
  mode: RealignMode;
  recomputed: RowRange;
}

const LINE_BREAK = /[\r\n]/;

function wholeTable(table: AlignmentTable): RowRange {
  return { startRow: 0, endRow: table.rows.length };
}

/**
 * One comparison tab: its panes, split points, alignment and history. Every
 * mutation goes through `execute` (or the save/reload helpers) and leaves the
 * table consistent with the pane contents.
 */
export class Document {
  private readonly panes: Pane[];
  private readonly history: UndoStack;
  private readonly nextTransactionId = createSequence('tx:');
  private readonly sink: DocumentSink;
  private readonly aligner: Aligner;
  private splits: SplitPoint[] = [];
  private policy: EqualityPolicy;
  private normalizer: LineNormalizer;
  private referencePane: number;
  private table: AlignmentTable;
  private index: DifferenceIndex;
  private current: DifferenceBlock | null = null;
  private generation = 0;
  private configVersion = 0;
  private pending: OpenTransaction | null = null;

  private constructor(
    panes: Pane[],
    policy: EqualityPolicy,
    normalizer: LineNormalizer,
    table: AlignmentTable,
    private readonly options: DocumentOptions
  ) {
    this.panes = panes;
    this.policy = policy;
    this.normalizer = normalizer;
    this.referencePane = options.referencePane;
    this.table = table;
    this.sink = options.sink;
    this.aligner = options.aligner;
    this.index = DifferenceIndex.build(table, this.lines(), normalizer, this.referencePane);
    this.history = new UndoStack({ apply: (op) => this.apply(op) }, options.undoLimit);
  }

  static create(sources: readonly LoadedSource[], options: Partial<DocumentOptions> = {}): Result<Document> {
    const resolved: DocumentOptions = { ...DEFAULT_DOCUMENT_OPTIONS, ...options };
    const policy = resolveEquality(resolved.equality);
    const normalizer = compileEquality(policy);
    if (!normalizer.ok) return normalizer;
    const panes = sources.map((source): Pane => {
      const lines = [...source.lines];
      return { paneId: createId('pane:'), label: source.label, lines, saved: [...lines], loaded: [...lines], identity: source.identity };
    });
    const table = resolved.aligner.compute(
      panes.map((pane) => pane.lines),
      [],
      normalizer.value,
      { referencePane: resolved.referencePane }
    );
    if (!table.ok) return table;
    return ok(new Document(panes, policy, normalizer.value, table.value, resolved));
  }

  get state(): DocumentState {
    if (this.pending) return DocumentState.EDITING;
    return this.panes.some((_, p) => this.isDirty(p)) ? DocumentState.DIRTY : DocumentState.CLEAN;
  }

  get paneCount(): number {
    return this.panes.length;
  }

  get alignment(): AlignmentTable {
    return this.table;
  }

  get splitPoints(): readonly SplitPoint[] {
    return this.splits;
  }

  get equality(): EqualityPolicy {
    return resolveEquality({}, this.policy);
  }

  execute(command: Command): CommandResult {
    this.sink.onCommandStarted(command);
    const result = this.dispatch(command);
    if (!result.ok) {
      result.error.command = command.type;
      this.sink.onError(result.error);
    }
    this.sink.onCommandFinished(command, result);
    return result;
  }

  snapshot(): ViewState {
    return {
      state: this.state,
      generation: this.generation,
      referencePane: this.referencePane,
      table: this.table,
      blocks: this.index.blocks,
      currentBlock: this.current,
      panes: this.panes.map((pane, p) => ({ paneId: pane.paneId, label: pane.label, lines: [...pane.lines], dirty: this.isDirty(p) })),
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo
    };
  }

  beginTransaction(label = 'edit'): Result<TransactionId> {
    if (this.pending) return fail(ErrorCode.STATE_ERROR, `Transaction ${this.pending.id} is already open`);
    const id = this.nextTransactionId();
    this.pending = { id, label, operations: [], tableBefore: this.table };
    return ok(id);
  }

  /** Closes the open transaction as one undo step; null when it changed nothing. */
  commitTransaction(): Result<Transaction | null> {
    const pending = this.pending;
    if (!pending) return fail(ErrorCode.STATE_ERROR, 'No transaction is open');
    this.pending = null;
    if (pending.operations.length === 0) return ok(null);
    const tx: Transaction = { ...pending, tableAfter: this.table, configVersion: this.configVersion };
    this.history.push(tx);
    return ok(tx);
  }

  rollbackTransaction(): Result<ViewState> {
    const pending = this.pending;
    if (!pending) return fail(ErrorCode.STATE_ERROR, 'No transaction is open');
    this.pending = null;
    this.revert(pending.operations);
    this.install(pending.tableBefore, RealignMode.RESTORED, null);
    return ok(this.snapshot());
  }

  paneText(pane: number): Result<string> {
    if (!this.isPane(pane)) return rangeError(`Pane index out of range: ${pane}`);
    return ok(joinLines(this.panes[pane].lines));
  }

  /** Hands `pane` to the collaborator; a confirmed save makes its content the saved baseline. */
  save(pane: number, persistence: PersistenceCollaborator): Result<void> {
    if (!this.isPane(pane)) return rangeError(`Pane index out of range: ${pane}`);
    const target = this.panes[pane];
    const lines = [...target.lines];
    const payload: SavePayload = {
      paneId: target.paneId,
      label: target.label,
      text: joinLines(lines),
      lines,
      dirty: this.isDirty(pane)
    };
    const saved = callCollaborator(() => persistence.save(payload), ErrorCode.SAVE_ERROR, { pane: target.label });
    if (!saved.ok) {
      this.sink.onError(saved.error);
      return saved;
    }
    target.saved = lines;
    if (saved.value !== undefined) target.identity = saved.value;
    return ok(undefined);
  }

  checkExternalChange<S>(pane: number, loader: Loader<S>, source: S): Result<boolean> {
    if (!this.isPane(pane)) return rangeError(`Pane index out of range: ${pane}`);
    const identify = loader.identity;
    if (!identify) return ok(false);
    const target = this.panes[pane];
    const current = callCollaborator(() => identify.call(loader, source), ErrorCode.LOAD_ERROR, { pane: target.label });
    if (!current.ok) return current;
    return ok(current.value !== undefined && current.value !== target.identity);
  }

  /** Replaces a pane's content with a fresh load. Undoable; the new content becomes the saved baseline. */
  reload(pane: number, source: LoadedSource): CommandResult {
    if (!this.isPane(pane)) return this.failure(ErrorCode.RANGE_ERROR, `Pane index out of range: ${pane}`);
    const target = this.panes[pane];
    const lines = [...source.lines];
    const result = sameLines(target.lines, lines) ? this.success(null) : this.mutate('reload', [replaceLines(pane, 0, target.lines, lines)]);
    if (!result.ok) return result;
    target.saved = [...lines];
    target.loaded = [...lines];
    target.identity = source.identity;
    return { ...result, view: this.snapshot() };
  }

  highlight(pane: number, collaborator: HighlightCollaborator): Result<void> {
    if (!this.isPane(pane)) return rangeError(`Pane index out of range: ${pane}`);
    collaborator.highlight(Object.freeze(this.table), pane, Object.freeze([...this.panes[pane].lines]));
    return ok(undefined);
  }

  prepareRealign(signal?: AbortSignal): PendingRealign {
    return {
      generation: this.generation,
      result: this.aligner.compute(this.lines(), this.splits, this.normalizer, { referencePane: this.referencePane, signal })
    };
  }

  commitRealign(pending: PendingRealign): CommandResult {
    if (pending.generation !== this.generation) {
      return this.failure(ErrorCode.CANCELLED, `Alignment from generation ${pending.generation} is stale (now ${this.generation})`);
    }
    if (!pending.result.ok) return this.failed(pending.result.error);
    this.install(pending.result.value, RealignMode.FULL, wholeTable(pending.result.value));
    return this.success(wholeTable(this.table));
  }

  private dispatch(command: Command): CommandResult {
    const type: string = command.type;
    switch (command.type) {
      case 'edit':
        return this.edit(command.pane, command.start, command.deleteCount, command.lines);
      case 'pin':
        return this.pin(command.anchors);
      case 'unpin':
        return this.unpin(command.row);
      case 'isolate':
        return this.isolate({ startRow: command.startRow, endRow: command.endRow });
      case 'realignAll':
        return this.realignAll();
      case 'navigate':
        return this.navigate(command.direction);
      case 'copySelection': {
        const { src, dst } = command;
        return this.withBlock(command.block, 'copy selection', (merge, block) => merge.copySelection(block, src, dst));
      }
      case 'copyUp': {
        const { src, dst } = command;
        return this.withBlock(command.block, 'copy up', (merge, block) => merge.copyUp(block, src, dst));
      }
      case 'copyDown': {
        const { src, dst } = command;
        return this.withBlock(command.block, 'copy down', (merge, block) => merge.copyDown(block, src, dst));
      }
      case 'copyInto': {
        const { src, dst, startRow, endRow } = command;
        return this.merge('copy into', (merge) => merge.copyInto(src, dst, { startRow, endRow }));
      }
      case 'mergeAll': {
        const { order, dst } = command;
        return this.merge('merge all', (merge) => merge.mergeInOrder(order, dst));
      }
      case 'undo':
        return this.step('undo');
      case 'redo':
        return this.step('redo');
      case 'dismissAllEdits':
        return this.dismissAllEdits();
      case 'setEquality':
        return this.setEquality(command.policy);
      case 'setReferencePane':
        return this.setReferencePane(command.pane);
      default:
        return this.failure(ErrorCode.INVALID_COMMAND, `Unknown command "${type}"`);
    }
  }

  private edit(pane: number, start: number, deleteCount: number, texts: readonly string[]): CommandResult {
    if (!this.isPane(pane)) return this.failure(ErrorCode.RANGE_ERROR, `Pane index out of range: ${pane}`);
    const lines = this.panes[pane].lines;
    if (!Number.isInteger(start) || !Number.isInteger(deleteCount) || start < 0 || deleteCount < 0 || start + deleteCount > lines.length) {
      return this.failure(ErrorCode.RANGE_ERROR, `Lines ${start}..${start + deleteCount} are outside pane ${pane} of ${lines.length} lines`);
    }
    if (texts.some((text) => LINE_BREAK.test(text))) {
      return this.failure(ErrorCode.INVALID_COMMAND, 'Edited lines must not contain line breaks');
    }
    const eol = dominantEol(lines);
    const removed = lines.slice(start, start + deleteCount);
    const inserted = fitInserted(lines, start, deleteCount, texts.map((text) => editedLine(text, eol)));
    if (sameLines(removed, inserted)) return this.success(null);
    return this.mutate('edit', [replaceLines(pane, start, removed, inserted)]);
  }

  private pin(anchors: readonly PinAnchor[]): CommandResult {
    if (anchors.length === 0) return this.failure(ErrorCode.INVALID_COMMAND, 'A pin needs at least one anchor');
    const cells: Cell[] = this.panes.map(() => null);
    let firstRow = this.table.rows.length;
    for (const { pane, line } of anchors) {
      if (!this.isPane(pane)) return this.failure(ErrorCode.RANGE_ERROR, `Pane index out of range: ${pane}`);
      if (cells[pane] !== null) return this.failure(ErrorCode.INVALID_COMMAND, `Pane ${pane} is anchored twice`);
      if (!Number.isInteger(line) || line < 0 || line >= this.panes[pane].lines.length) {
        return this.failure(ErrorCode.RANGE_ERROR, `Line ${line} is outside pane ${pane}`);
      }
      cells[pane] = line;
      const row = this.table.rows.findIndex((r) => r.cells[pane] === line);
      if (row >= 0 && row < firstRow) firstRow = row;
    }
    const before = cutsBeforeRow(this.table, firstRow);
    const pin = makePin(
      cells,
      cells.map((cell, p) => cell ?? before[p])
    );
    const after = insertSplit(this.splits, pin, this.lineCounts());
    if (!after) return this.failure(ErrorCode.ALIGNMENT_ERROR, 'Pin contradicts the existing pins or isolated ranges');

    const result = this.mutate('pin', [setSplits(this.splits, after)]);
    if (!result.ok) return result;
    const k = after.filter((split) => split.kind === SplitKind.PIN).indexOf(pin);
    const row = this.table.pinRows[k];
    return { ...result, affectedRows: { startRow: row, endRow: row + 1 } };
  }

  private unpin(row: number): CommandResult {
    const k = this.table.pinRows.indexOf(row);
    if (k < 0) return this.failure(ErrorCode.RANGE_ERROR, `Row ${row} is not pinned`);
    const pinAt = this.splits.flatMap((split, i) => (split.kind === SplitKind.PIN ? [i] : []))[k];
    return this.mutate(
      'unpin',
      [setSplits(this.splits, this.splits.filter((_, i) => i !== pinAt))]
    );
  }

  private isolate(range: RowRange): CommandResult {
    const rows = this.table.rows.length;
    const { startRow, endRow } = range;
    if (!Number.isInteger(startRow) || !Number.isInteger(endRow) || startRow < 0 || endRow > rows || startRow >= endRow) {
      return this.failure(ErrorCode.RANGE_ERROR, `Rows ${startRow}..${endRow} are outside the table of ${rows} rows`);
    }
    const counts = this.lineCounts();
    const opened = insertSplit(this.splits, makeCut(cutsBeforeRow(this.table, startRow)), counts);
    const closed = opened && insertSplit(opened, makeCut(cutsBeforeRow(this.table, endRow)), counts);
    if (!closed) return this.failure(ErrorCode.ALIGNMENT_ERROR, `Rows ${startRow}..${endRow} cannot be isolated from the existing split points`);
    return this.mutate('isolate', [setSplits(this.splits, closed)]);
  }

  private realignAll(): CommandResult {
    if (this.splits.length > 0) return this.mutate('realign all', [setSplits(this.splits, [])]);
    const table = this.align();
    if (!table.ok) return this.failed(table.error);
    this.install(table.value, RealignMode.FULL, wholeTable(table.value));
    return this.success(wholeTable(this.table));
  }

  private navigate(direction: NavigateDirection): CommandResult {
    const navigation = this.index.navigate(direction, this.current);
    this.current = navigation.block;
    const block = navigation.block;
    const affectedRows = block ? { startRow: block.startRow, endRow: block.endRow } : null;
    return { ok: true, view: this.snapshot(), affectedRows, navigation };
  }

  private withBlock(
    index: number,
    label: string,
    build: (merge: MergeOperator, block: RowRange) => Result<ReplaceLinesOp[]>
  ): CommandResult {
    if (!Number.isInteger(index) || index < 0 || index >= this.index.size) {
      return this.failure(ErrorCode.RANGE_ERROR, `No difference block ${index}`);
    }
    const block = this.index.blocks[index];
    return this.merge(label, (merge) => build(merge, block));
  }

  private merge(label: string, build: (merge: MergeOperator) => Result<ReplaceLinesOp[]>): CommandResult {
    const ops = build(new MergeOperator({ table: this.table, panes: this.lines(), normalizer: this.normalizer }));
    if (!ops.ok) return this.failed(ops.error);
    return this.mutate(label, ops.value);
  }

  private step(direction: 'undo' | 'redo'): CommandResult {
    if (this.pending) return this.failure(ErrorCode.STATE_ERROR, `Cannot ${direction} while transaction ${this.pending.id} is open`);
    const tx = direction === 'undo' ? this.history.undo() : this.history.redo();
    if (!tx) return this.success(null);
    if (tx.configVersion === this.configVersion) {
      const stored = direction === 'undo' ? tx.tableBefore : tx.tableAfter;
      this.install(stored, RealignMode.RESTORED, null);
      return this.success(wholeTable(this.table));
    }
    const table = this.align();
    if (!table.ok) {
      if (direction === 'undo') this.history.redo();
      else this.history.undo();
      return this.failed(table.error);
    }
    this.install(table.value, RealignMode.FULL, wholeTable(table.value));
    return this.success(wholeTable(this.table));
  }

  private dismissAllEdits(): CommandResult {
    if (this.pending) return this.failure(ErrorCode.STATE_ERROR, `Cannot dismiss edits while transaction ${this.pending.id} is open`);
    const lines = this.panes.map((pane) => [...pane.loaded]);
    const table = this.aligner.compute(lines, [], this.normalizer, { referencePane: this.referencePane });
    if (!table.ok) return this.failed(table.error);
    this.panes.forEach((pane, p) => {
      pane.lines = lines[p];
    });
    this.splits = [];
    this.history.clear();
    this.install(table.value, RealignMode.FULL, wholeTable(table.value));
    return this.success(wholeTable(this.table));
  }

  private setEquality(partial: Partial<EqualityPolicy>): CommandResult {
    if (this.pending) return this.failure(ErrorCode.STATE_ERROR, `Cannot change equality while transaction ${this.pending.id} is open`);
    const policy = resolveEquality(partial, this.policy);
    const normalizer = compileEquality(policy);
    if (!normalizer.ok) return this.failed(normalizer.error);
    const table = this.aligner.compute(this.lines(), this.splits, normalizer.value, { referencePane: this.referencePane });
    if (!table.ok) return this.failed(table.error);
    this.policy = policy;
    this.normalizer = normalizer.value;
    this.configVersion += 1;
    this.install(table.value, RealignMode.FULL, wholeTable(table.value));
    return this.success(wholeTable(this.table));
  }

  private setReferencePane(pane: number): CommandResult {
    if (this.pending) return this.failure(ErrorCode.STATE_ERROR, `Cannot change the reference pane while transaction ${this.pending.id} is open`);
    if (!this.isPane(pane)) return this.failure(ErrorCode.RANGE_ERROR, `Pane index out of range: ${pane}`);
    if (pane === this.referencePane) return this.success(null);
    const table = this.aligner.compute(this.lines(), this.splits, this.normalizer, { referencePane: pane });
    if (!table.ok) return this.failed(table.error);
    this.referencePane = pane;
    this.configVersion += 1;
    this.install(table.value, RealignMode.FULL, wholeTable(table.value));
    return this.success(wholeTable(this.table));
  }

  /**
   * Applies `ops` in order, carrying split points across every line
   * replacement, realigns, and records the result as one transaction (or
   * appends it to the open one). On realignment failure nothing changes.
   */
  private mutate(label: string, ops: readonly EditOperation[]): CommandResult {
    const tableBefore = this.table;
    const applied: EditOperation[] = [];
    const touched = new Set<number>();
    for (const op of ops) {
      this.record(op, applied);
      if (isReplace(op)) touched.add(op.pane);
    }
    for (const pane of touched) {
      for (const repair of eolRepairs(pane, this.panes[pane].lines)) this.record(repair, applied);
    }
    if (applied.length === 0) return this.success(null);

    const realigned = this.realign(applied);
    if (!realigned.ok) {
      this.revert(applied);
      return this.failed(realigned.error);
    }
    const { table, mode, recomputed } = realigned.value;
    this.install(table, mode, recomputed);
    if (this.pending) {
      this.pending.operations.push(...applied);
    } else {
      this.history.push({
        id: this.nextTransactionId(),
        label,
        operations: applied,
        tableBefore,
        tableAfter: table,
        configVersion: this.configVersion
      });
    }
    return this.success(recomputed);
  }

  private record(op: EditOperation, applied: EditOperation[]): void {
    this.apply(op);
    applied.push(op);
    if (!isReplace(op)) return;
    const shifted = shiftSplits(this.splits, lineEditOf(op));
    if (sameSplits(shifted, this.splits)) return;
    const moved = setSplits(this.splits, shifted);
    this.apply(moved);
    applied.push(moved);
  }

  private revert(applied: readonly EditOperation[]): void {
    for (let i = applied.length - 1; i >= 0; i -= 1) this.apply(invert(applied[i]));
  }

  private apply(op: EditOperation): void {
    if (op.type === OpType.REPLACE_LINES) spliceLines(this.panes[op.pane].lines, op);
    else this.splits = [...op.after];
  }

  private realign(applied: readonly EditOperation[]): Result<Realigned> {
    const replaced = applied.filter(isReplace);
    if (this.options.incremental && replaced.length === 1) {
      const incremental = this.aligner.computeIncremental(this.table, this.lines(), this.splits, lineEditOf(replaced[0]), this.normalizer, {
        referencePane: this.referencePane
      });
      return incremental.ok ? ok({ ...incremental.value, mode: RealignMode.INCREMENTAL }) : incremental;
    }
    const table = this.align();
    return table.ok ? ok({ table: table.value, mode: RealignMode.FULL, recomputed: wholeTable(table.value) }) : table;
  }

  private align(): Result<AlignmentTable> {
    return this.aligner.compute(this.lines(), this.splits, this.normalizer, { referencePane: this.referencePane });
  }

  private install(table: AlignmentTable, mode: RealignMode, recomputed: RowRange | null): void {
    this.table = table;
    this.generation += 1;
    this.index = DifferenceIndex.build(table, this.lines(), this.normalizer, this.referencePane);
    this.current = this.current ? this.index.blockFrom(this.current.startRow) : null;
    this.sink.onRealigned({ mode, generation: this.generation, rows: table.rows.length, recomputed });
  }

  private lines(): Line[][] {
    return this.panes.map((pane) => pane.lines);
  }

  private lineCounts(): number[] {
    return this.panes.map((pane) => pane.lines.length);
  }

  private isDirty(pane: number): boolean {
    return !sameLines(this.panes[pane].lines, this.panes[pane].saved);
  }

  private isPane(pane: number): boolean {
    return Number.isInteger(pane) && pane >= 0 && pane < this.panes.length;
  }

  private success(affectedRows: RowRange | null): CommandResult {
    return { ok: true, view: this.snapshot(), affectedRows };
  }

  private failure(code: ErrorCode, message: string): CommandResult {
    return this.failed(makeError(code, message));
  }

  private failed(error: CoreError): CommandResult {
    return { ok: false, error };
  }
}
