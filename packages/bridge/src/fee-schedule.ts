/**
 * Fee Schedule — what a bridge-out costs, per destination.
 *
 * Destinations map to a fee class; fee classes map to an amount in
 * native units of the sending ledger. Several destinations can share
 * a class (e.g. "l2" for every rollup).
 *
 * Rules:
 * - Fees are non-negative
 * - A destination without a class, or whose class has no fee, is not
 *   supported
 * - Updates are all-or-nothing: one invalid entry rejects the update
 */

import type { LedgerId } from "@relaymint/types";
import { BridgeError } from "./errors.js";

/**
 * A partial change to the schedule. Entries present replace existing ones.
 */
export interface FeeScheduleUpdate {
  /** destination ledger → fee class */
  readonly classes?: Readonly<Record<LedgerId, string>>;
  /** fee class → required fee */
  readonly fees?: Readonly<Record<string, bigint>>;
}

/**
 * JSON-safe view of the schedule.
 */
export interface FeeScheduleView {
  readonly classes: Readonly<Record<LedgerId, string>>;
  readonly fees: Readonly<Record<string, string>>;
}

export class FeeSchedule {
  private readonly _classes = new Map<LedgerId, string>();
  private readonly _fees = new Map<string, bigint>();

  constructor(initial?: FeeScheduleUpdate) {
    if (initial !== undefined) {
      this.update(initial);
    }
  }

  update(update: FeeScheduleUpdate): void {
    const classes = Object.entries(update.classes ?? {});
    const fees = Object.entries(update.fees ?? {});

    for (const [destination, feeClass] of classes) {
      if (destination === "" || feeClass.trim() === "") {
        throw new BridgeError(
          "INVALID_FEE",
          `Fee class mapping "${destination}" → "${feeClass}" must name both sides`,
        );
      }
    }
    for (const [feeClass, amount] of fees) {
      if (amount < 0n) {
        throw new BridgeError(
          "INVALID_FEE",
          `Fee for class "${feeClass}" must be non-negative, got ${amount.toString()}`,
        );
      }
    }

    for (const [destination, feeClass] of classes) {
      this._classes.set(destination, feeClass);
    }
    for (const [feeClass, amount] of fees) {
      this._fees.set(feeClass, amount);
    }
  }

  classOf(destination: LedgerId): string | undefined {
    return this._classes.get(destination);
  }

  /**
   * Fee required to bridge to `destination`.
   *
   * @throws {BridgeError} UNSUPPORTED_DESTINATION if no fee applies
   */
  requiredFee(destination: LedgerId): bigint {
    const feeClass = this._classes.get(destination);
    if (feeClass === undefined) {
      throw new BridgeError(
        "UNSUPPORTED_DESTINATION",
        `No fee class configured for destination "${destination}"`,
      );
    }
    const fee = this._fees.get(feeClass);
    if (fee === undefined) {
      throw new BridgeError(
        "UNSUPPORTED_DESTINATION",
        `No fee configured for class "${feeClass}" (destination "${destination}")`,
      );
    }
    return fee;
  }

  /**
   * Replace the whole schedule with a previously taken view.
   */
  restore(view: FeeScheduleView): void {
    this._classes.clear();
    this._fees.clear();
    for (const [destination, feeClass] of Object.entries(view.classes)) {
      this._classes.set(destination, feeClass);
    }
    for (const [feeClass, amount] of Object.entries(view.fees)) {
      this._fees.set(feeClass, BigInt(amount));
    }
  }

  toJSON(): FeeScheduleView {
    const classes: Record<LedgerId, string> = {};
    for (const [destination, feeClass] of this._classes) {
      classes[destination] = feeClass;
    }
    const fees: Record<string, string> = {};
    for (const [feeClass, amount] of this._fees) {
      fees[feeClass] = amount.toString();
    }
    return { classes, fees };
  }
}
