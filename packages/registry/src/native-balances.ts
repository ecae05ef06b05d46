/**
 * @relaymint/registry — Native value book.
 *
 * Tracks native-unit balances on one ledger. Bridge roles charge
 * payments to it and sweep fees through it; transports refund unused
 * delivery budget through it.
 *
 * Recipients can refuse value (a blocked address) or run a hook when
 * value arrives. A throwing hook reverts the credit.
 */

import type { Address, LedgerId } from "@relaymint/types";
import { NULL_ADDRESS } from "@relaymint/types";
import type { PaymentChannel, PayoutChannel, PayoutHook } from "./types.js";
import { RegistryError } from "./types.js";

export class NativeBalances implements PayoutChannel, PaymentChannel {
  readonly ledgerId: LedgerId;
  private readonly _balances = new Map<Address, bigint>();
  private readonly _blocked = new Set<Address>();
  private readonly _hooks = new Map<Address, PayoutHook>();

  /**
   * @param payer - Address reported to recipient hooks as the sender
   */
  constructor(ledgerId: LedgerId, private readonly payer: Address = NULL_ADDRESS) {
    this.ledgerId = ledgerId;
  }

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  /**
   * Total value held across all addresses.
   */
  get totalHeld(): bigint {
    let sum = 0n;
    for (const value of this._balances.values()) sum += value;
    return sum;
  }

  /**
   * Make every future payout to `address` fail.
   */
  block(address: Address): void {
    this._blocked.add(address);
  }

  unblock(address: Address): void {
    this._blocked.delete(address);
  }

  onReceive(address: Address, hook: PayoutHook): void {
    this._hooks.set(address, hook);
  }

  /**
   * Credit `to` directly. No block or hook applies.
   */
  deposit(to: Address, amount: bigint): void {
    assertPositive(amount);
    if (to === NULL_ADDRESS) {
      throw new RegistryError("INVALID_RECIPIENT", "Cannot credit the null address");
    }
    this._balances.set(to, this.balanceOf(to) + amount);
  }

  charge(from: Address, amount: bigint): void {
    assertPositive(amount);
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new RegistryError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${available.toString()}, needs ${amount.toString()}`,
      );
    }
    this._balances.set(from, available - amount);
  }

  send(to: Address, amount: bigint): void {
    assertPositive(amount);
    if (to === NULL_ADDRESS) {
      throw new RegistryError("INVALID_RECIPIENT", "Cannot pay the null address");
    }
    if (this._blocked.has(to)) {
      throw new RegistryError("RECIPIENT_REJECTED", `Recipient ${to} rejected the payout`);
    }

    const before = this.balanceOf(to);
    this._balances.set(to, before + amount);

    const hook = this._hooks.get(to);
    if (hook === undefined) return;

    try {
      hook(this.payer, amount);
    } catch (err) {
      this._balances.set(to, before);
      throw err;
    }
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new RegistryError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
  }
}
