/**
 * Fee Escrow — collected bridging fees awaiting withdrawal.
 *
 * The balance grows only through `accrue` (a successful debit) and
 * shrinks only through `sweep` (an administrative withdrawal of the
 * whole balance). Both record their reversal in the operation's
 * journal, so a rolled-back operation leaves the escrow untouched.
 */

import type { UndoJournal } from "./journal.js";

export interface FeeEscrowView {
  readonly balance: string;
  readonly totalCollected: string;
  readonly totalWithdrawn: string;
}

export class FeeEscrow {
  private _balance = 0n;
  private _totalCollected = 0n;
  private _totalWithdrawn = 0n;

  get balance(): bigint {
    return this._balance;
  }

  get totalCollected(): bigint {
    return this._totalCollected;
  }

  get totalWithdrawn(): bigint {
    return this._totalWithdrawn;
  }

  accrue(amount: bigint, journal: UndoJournal): void {
    if (amount <= 0n) return;

    this._balance += amount;
    this._totalCollected += amount;
    journal.record(() => {
      this._balance -= amount;
      this._totalCollected -= amount;
    });
  }

  /**
   * Empty the escrow and return what it held.
   */
  sweep(journal: UndoJournal): bigint {
    const amount = this._balance;

    this._balance = 0n;
    this._totalWithdrawn += amount;
    journal.record(() => {
      this._balance += amount;
      this._totalWithdrawn -= amount;
    });

    return amount;
  }

  toJSON(): FeeEscrowView {
    return {
      balance: this._balance.toString(),
      totalCollected: this._totalCollected.toString(),
      totalWithdrawn: this._totalWithdrawn.toString(),
    };
  }
}
