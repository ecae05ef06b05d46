/**
 * Undo journal.
 *
 * Each step of an operation that changes state records how to reverse
 * itself. If a later step throws, the recorded compensations run in
 * reverse order, restoring the state the operation started from.
 */

import { BridgeError } from "./errors.js";

export class UndoJournal {
  private readonly _steps: Array<() => void> = [];

  record(undo: () => void): void {
    this._steps.push(undo);
  }

  get size(): number {
    return this._steps.length;
  }

  /**
   * Run every compensation, newest first. All of them run even if one
   * fails; failures are reported together afterwards, caused by
   * `reason`, the error that made the operation roll back.
   */
  rollback(reason?: unknown): void {
    const failures: unknown[] = [];

    while (this._steps.length > 0) {
      const undo = this._steps.pop();
      if (undo === undefined) break;
      try {
        undo();
      } catch (err) {
        failures.push(err);
      }
    }

    if (failures.length > 0) {
      const after =
        reason instanceof Error ? ` while rolling back after: ${reason.message}` : " during rollback";
      throw new BridgeError(
        "ROLLBACK_FAILED",
        `${failures.length} compensation step(s) failed${after}`,
        {
          cause: new AggregateError(
            failures,
            "Compensation failures",
            reason === undefined ? undefined : { cause: reason },
          ),
        },
      );
    }
  }
}
