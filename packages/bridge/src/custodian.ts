/**
 * Origin Custodian — lock and unlock on the asset's native ledger.
 *
 * Debit moves the asset into the custodian's registry custody, records
 * a lock entry and sends the bridge message. Credit requires a live
 * lock entry, clears it and releases the asset to the recipient.
 *
 * Invariant: a lock entry exists for an asset exactly while the
 * registry shows the custodian as its owner because of a bridge lock.
 * The lock table is the double-spend guard on credit: a duplicate or
 * forged unlock finds no entry and fails with NOT_LOCKED.
 */

import type { Address, AssetId, LedgerId, MessageDelivery } from "@relaymint/types";
import type { AssetRegistry } from "@relaymint/registry";
import { BridgeError } from "./errors.js";
import { BridgeRole } from "./role.js";
import type { RoleOptions } from "./role.js";
import type { BridgeOutOptions, BridgeReceipt, RoleStatus } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface LockEntry {
  readonly assetId: AssetId;
  readonly locked: true;
  /** Owner at the moment of locking */
  readonly originalHolder: Address;
  readonly destination: LedgerId;
  /** Message that carried the asset away */
  readonly messageId: string;
  /** ISO 8601 */
  readonly lockedAt: string;
}

export interface OriginCustodianOptions extends RoleOptions {
  readonly registry: AssetRegistry;
}

export interface CustodianStatus extends RoleStatus {
  readonly lockedAssets: readonly string[];
}

// =============================================================================
// Custodian
// =============================================================================

export class OriginCustodian extends BridgeRole {
  private readonly _locks = new Map<AssetId, LockEntry>();

  constructor(options: OriginCustodianOptions) {
    super("custodian", options, options.registry);
  }

  // ─── Debit ───────────────────────────────────────────────────────────

  bridgeOut(
    caller: Address,
    assetId: AssetId,
    destination: LedgerId,
    payment: bigint,
    options: BridgeOutOptions = {},
  ): BridgeReceipt {
    return this.policy.execute({ operation: "bridgeOut", actor: caller, assetId }, (ctx) => {
      const { holder, recipient, refundAddress } = this.resolveOutbound(caller, assetId, options);
      if (this._locks.has(assetId)) {
        throw new BridgeError("ALREADY_LOCKED", `Asset ${assetId.toString()} is already locked`);
      }
      this.assertAuthorized(caller, assetId);

      const prepared = this.dispatcher.prepare(destination, payment, {
        version: 1,
        assetId,
        sender: holder,
        recipient,
      });

      this.policy.collectPayment(caller, payment, ctx.journal);

      this.registry.transferCustody(this.address, holder, this.address, assetId);
      ctx.journal.record(() => {
        this.registry.revert(this.address, assetId);
      });

      this.policy.escrow.accrue(prepared.fee, ctx.journal);
      const handle = this.dispatcher.send(prepared, refundAddress);

      this._locks.set(assetId, {
        assetId,
        locked: true,
        originalHolder: holder,
        destination,
        messageId: handle.messageId,
        lockedAt: new Date().toISOString(),
      });
      ctx.journal.record(() => {
        this._locks.delete(assetId);
      });

      ctx.stage("asset.locked", handle.messageId, {
        assetId: assetId.toString(),
        holder,
        recipient,
        destination,
      });
      if (prepared.fee > 0n) {
        ctx.stage("fee.collected", handle.messageId, {
          amount: prepared.fee.toString(),
          destination,
        });
      }

      return {
        messageId: handle.messageId,
        assetId,
        destination,
        holder,
        recipient,
        fee: prepared.fee,
        deliveryBudget: prepared.deliveryBudget,
        deliveryCost: handle.deliveryCost,
        refunded: handle.refunded,
      };
    });
  }

  // ─── Credit ──────────────────────────────────────────────────────────

  receive(delivery: MessageDelivery): void {
    this.policy.execute({ operation: "receive", actor: delivery.sender }, (ctx) => {
      this.policy.assertActive();
      const message = this.dispatcher.accept(delivery);
      this.policy.assertRecipient(message.recipient);

      const entry = this._locks.get(message.assetId);
      if (entry === undefined) {
        throw new BridgeError(
          "NOT_LOCKED",
          `Asset ${message.assetId.toString()} is not locked; nothing to release`,
        );
      }
      this.assertHolds(message.assetId);
      this.dispatcher.consume(delivery.messageId, ctx.journal);

      this._locks.delete(message.assetId);
      ctx.journal.record(() => {
        this._locks.set(message.assetId, entry);
      });
      this.registry.transferCustody(this.address, this.address, message.recipient, message.assetId);

      ctx.stage("asset.unlocked", delivery.messageId, {
        assetId: message.assetId.toString(),
        recipient: message.recipient,
        sourceLedger: delivery.sourceLedger,
      });
    });
  }

  // ─── Recovery ────────────────────────────────────────────────────────

  /**
   * Return a custodied asset to `recipient` and clear its lock.
   * Usable while paused.
   */
  emergencyRecover(caller: Address, assetId: AssetId, recipient: Address): void {
    this.policy.execute({ operation: "emergencyRecover", actor: caller, assetId }, (ctx) => {
      this.policy.assertAdmin(caller);
      this.policy.assertRecipient(recipient);
      this.assertHolds(assetId);

      const entry = this._locks.get(assetId);
      if (entry !== undefined) {
        this._locks.delete(assetId);
        ctx.journal.record(() => {
          this._locks.set(assetId, entry);
        });
      }
      this.registry.transferCustody(this.address, this.address, recipient, assetId);

      ctx.stage("emergency.recovered", `recover:${assetId.toString()}`, {
        assetId: assetId.toString(),
        recipient,
        wasLocked: entry !== undefined,
      });
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  isLocked(assetId: AssetId): boolean {
    return this._locks.has(assetId);
  }

  lockOf(assetId: AssetId): LockEntry | undefined {
    return this._locks.get(assetId);
  }

  originalHolderOf(assetId: AssetId): Address | undefined {
    return this._locks.get(assetId)?.originalHolder;
  }

  lockedAssets(): readonly AssetId[] {
    return [...this._locks.keys()];
  }

  status(): CustodianStatus {
    return {
      ...this.policy.snapshot(),
      lockedAssets: this.lockedAssets().map((id) => id.toString()),
    };
  }
}
