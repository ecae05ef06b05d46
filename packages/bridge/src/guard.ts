/**
 * Reentrancy guard.
 *
 * One per role instance. The flag is set on entry, checked on entry,
 * and cleared in `finally` so every exit path releases it, including
 * an early throw.
 */

import { BridgeError } from "./errors.js";

export class ReentrancyGuard {
  private _current: string | undefined;

  /** Name of the operation holding the guard, if any. */
  get current(): string | undefined {
    return this._current;
  }

  get held(): boolean {
    return this._current !== undefined;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this._current !== undefined) {
      throw new BridgeError(
        "REENTRANT_CALL",
        `Cannot start "${operation}" while "${this._current}" is in progress`,
      );
    }

    this._current = operation;
    try {
      return fn();
    } finally {
      this._current = undefined;
    }
  }
}
