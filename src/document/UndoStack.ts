import type { OperationTarget, Transaction } from '../types/operations.js';
import { invert } from '../ops/operations.js';

export class UndoStack {
  private readonly undoList: Transaction[] = [];
  private readonly redoList: Transaction[] = [];

  constructor(
    private readonly target: OperationTarget,
    private readonly limit = Number.POSITIVE_INFINITY
  ) {}

  get canUndo(): boolean {
    return this.undoList.length > 0;
  }

  get canRedo(): boolean {
    return this.redoList.length > 0;
  }

  get depth(): number {
    return this.undoList.length;
  }

  peek(): Transaction | undefined {
    return this.undoList[this.undoList.length - 1];
  }

  push(tx: Transaction): void {
    this.undoList.push(tx);
    this.redoList.length = 0;
    while (this.undoList.length > this.limit) this.undoList.shift();
  }

  /** Reverts the most recent transaction; null when there is nothing to undo. */
  undo(): Transaction | null {
    const tx = this.undoList.pop();
    if (!tx) return null;
    for (let i = tx.operations.length - 1; i >= 0; i -= 1) {
      this.target.apply(invert(tx.operations[i]));
    }
    this.redoList.push(tx);
    return tx;
  }

  redo(): Transaction | null {
    const tx = this.redoList.pop();
    if (!tx) return null;
    for (const op of tx.operations) this.target.apply(op);
    this.undoList.push(tx);
    return tx;
  }

  clear(): void {
    this.undoList.length = 0;
    this.redoList.length = 0;
  }
}
