/**
 * @relaymint/registry — Collaborator interfaces and error types.
 *
 * The bridge never owns ownership bookkeeping. It talks to an asset
 * registry and a payout channel through these interfaces, as their
 * privileged caller for bridge-driven mint, burn and transfer.
 *
 * Rules:
 * - Every mutating call names its caller explicitly
 * - Fail-closed: invalid calls throw, never silently succeed
 * - A call that throws leaves the registry unchanged
 */

import type { Address, AssetId, LedgerId } from "@relaymint/types";

// ─── Transfer Context ────────────────────────────────────────────────────

/**
 * Describes one ownership change. `from` is the null address on mint,
 * `to` is the null address on burn.
 */
export interface TransferContext {
  readonly operator: Address;
  readonly from: Address;
  readonly to: Address;
  readonly assetId: AssetId;
}

/**
 * Called before every ownership change. Throwing vetoes the change.
 */
export type TransferHook = (ctx: TransferContext) => void;

/**
 * Safe-transfer notification, called after an asset arrives at an
 * address that registered a receiver. Throwing reverts the transfer.
 */
export interface AssetReceiver {
  onAssetReceived(ctx: TransferContext): void;
}

// ─── Registry ────────────────────────────────────────────────────────────

/**
 * A non-fungible asset registry on a single ledger.
 */
export interface AssetRegistry {
  readonly ledgerId: LedgerId;

  exists(assetId: AssetId): boolean;

  /** Throws NONEXISTENT_ASSET if the asset does not exist. */
  ownerOf(assetId: AssetId): Address;

  /** Owner, approved address, or operator approved for all of the owner's assets. */
  isAuthorized(spender: Address, assetId: AssetId): boolean;

  transferCustody(caller: Address, from: Address, to: Address, assetId: AssetId): void;

  /** Privileged: caller must be a registered minter. */
  mint(caller: Address, to: Address, assetId: AssetId): void;

  /** Privileged: caller must be a registered minter. */
  burn(caller: Address, assetId: AssetId): void;

  /**
   * Compensation for the latest move of `assetId`, which `caller` must
   * have made: restores the previous owner and approval without running
   * the transfer hook or receivers.
   */
  revert(caller: Address, assetId: AssetId): void;
}

/**
 * A registry whose issuer can install a veto over ownership changes.
 */
export interface WrappedAssetRegistry extends AssetRegistry {
  setTransferHook(hook: TransferHook | undefined): void;
}

// ─── Payouts ─────────────────────────────────────────────────────────────

/**
 * Moves native value out of a role to an arbitrary recipient.
 */
export interface PayoutChannel {
  send(to: Address, amount: bigint): void;
}

/**
 * Takes native value from a caller to pay for an operation.
 */
export interface PaymentChannel {
  balanceOf(address: Address): bigint;
  /** @throws {RegistryError} INSUFFICIENT_BALANCE */
  charge(from: Address, amount: bigint): void;
  /** Credit without running blocks or hooks. Also gives back a charge on rollback. */
  deposit(to: Address, amount: bigint): void;
}

/**
 * Called after native value arrives at an address.
 * Throwing reverts the payout.
 */
export type PayoutHook = (from: Address, amount: bigint) => void;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for registry and payout operations. */
export type RegistryErrorCode =
  | "NONEXISTENT_ASSET"
  | "ASSET_EXISTS"
  | "NOT_AUTHORIZED"
  | "NOT_MINTER"
  | "INVALID_RECIPIENT"
  | "OWNER_MISMATCH"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "RECIPIENT_REJECTED";

/**
 * Structured error from a registry collaborator.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}
