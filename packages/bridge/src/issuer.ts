/**
 * Destination Issuer — burn and mint of the wrapped representation.
 *
 * Debit burns the wrapped instance and sends the bridge message.
 * Credit mints it to the recipient. There is no lock table: the
 * registry's "at most one live instance per id" is the double-mint
 * guard, surfaced as ALREADY_MINTED.
 *
 * The issuer installs itself as the registry's transfer hook. Its own
 * mints and burns pass straight through; every other transfer is put
 * to the configured TransferValidator, if any. Emergency recovery is
 * an ordinary transfer and is validated too.
 */

import type { Address, AssetId, LedgerId, MessageDelivery } from "@relaymint/types";
import { NULL_ADDRESS } from "@relaymint/types";
import type { TransferContext, WrappedAssetRegistry } from "@relaymint/registry";
import { BridgeError } from "./errors.js";
import { BridgeRole } from "./role.js";
import type { RoleOptions } from "./role.js";
import type { BridgeOutOptions, BridgeReceipt, RoleStatus } from "./types.js";
import type { TransferValidator } from "./validators.js";

// =============================================================================
// Types
// =============================================================================

/** 100% in basis points */
export const MAX_BASIS_POINTS = 10_000;

export interface RoyaltyConfig {
  readonly receiver: Address;
  readonly feeBasisPoints: number;
}

export interface RoyaltyQuote {
  readonly receiver: Address;
  readonly amount: bigint;
}

export interface DestinationIssuerOptions extends RoleOptions {
  readonly registry: WrappedAssetRegistry;
  readonly validator?: TransferValidator | undefined;
  readonly royalty?: RoyaltyConfig | undefined;
}

export interface IssuerStatus extends RoleStatus {
  readonly validator: string | null;
  readonly royalty: RoyaltyConfig | null;
}

// =============================================================================
// Issuer
// =============================================================================

export class DestinationIssuer extends BridgeRole {
  private _validator: TransferValidator | undefined;
  private _royalty: RoyaltyConfig | undefined;

  constructor(options: DestinationIssuerOptions) {
    super("issuer", options, options.registry);
    if (options.royalty !== undefined) {
      assertRoyalty(options.royalty);
    }
    this._validator = options.validator;
    this._royalty = options.royalty;
    options.registry.setTransferHook((ctx) => {
      this._checkTransfer(ctx);
    });
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
      this.assertAuthorized(caller, assetId);

      const prepared = this.dispatcher.prepare(destination, payment, {
        version: 1,
        assetId,
        sender: holder,
        recipient,
      });

      this.policy.collectPayment(caller, payment, ctx.journal);

      this.registry.burn(this.address, assetId);
      ctx.journal.record(() => {
        this.registry.revert(this.address, assetId);
      });

      this.policy.escrow.accrue(prepared.fee, ctx.journal);
      const handle = this.dispatcher.send(prepared, refundAddress);

      ctx.stage("asset.burned", handle.messageId, {
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

      if (this.registry.exists(message.assetId)) {
        throw new BridgeError(
          "ALREADY_MINTED",
          `Asset ${message.assetId.toString()} already has a live instance on "${this.ledgerId}"`,
        );
      }
      this.dispatcher.consume(delivery.messageId, ctx.journal);

      this.registry.mint(this.address, message.recipient, message.assetId);

      ctx.stage("asset.minted", delivery.messageId, {
        assetId: message.assetId.toString(),
        recipient: message.recipient,
        sourceLedger: delivery.sourceLedger,
      });
    });
  }

  // ─── Recovery ────────────────────────────────────────────────────────

  /**
   * Release a wrapped asset the issuer itself holds. Usable while paused.
   */
  emergencyRecover(caller: Address, assetId: AssetId, recipient: Address): void {
    this.policy.execute({ operation: "emergencyRecover", actor: caller, assetId }, (ctx) => {
      this.policy.assertAdmin(caller);
      this.policy.assertRecipient(recipient);
      this.assertHolds(assetId);

      this.registry.transferCustody(this.address, this.address, recipient, assetId);

      ctx.stage("emergency.recovered", `recover:${assetId.toString()}`, {
        assetId: assetId.toString(),
        recipient,
        wasLocked: false,
      });
    });
  }

  // ─── Administration ──────────────────────────────────────────────────

  setTransferValidator(caller: Address, validator: TransferValidator | undefined): void {
    this.policy.execute({ operation: "setTransferValidator", actor: caller }, (ctx) => {
      this.policy.assertAdmin(caller);

      const previous = this._validator;
      this._validator = validator;
      ctx.journal.record(() => {
        this._validator = previous;
      });

      ctx.stage("validator.updated", `validator:${this.ledgerId}`, {
        validator: validator?.id ?? null,
      });
    });
  }

  setRoyaltyInfo(caller: Address, receiver: Address, feeBasisPoints: number): void {
    this.policy.execute({ operation: "setRoyaltyInfo", actor: caller }, (ctx) => {
      this.policy.assertAdmin(caller);
      const royalty: RoyaltyConfig = { receiver, feeBasisPoints };
      assertRoyalty(royalty);

      const previous = this._royalty;
      this._royalty = royalty;
      ctx.journal.record(() => {
        this._royalty = previous;
      });

      ctx.stage("royalty.updated", `royalty:${this.ledgerId}`, {
        receiver,
        feeBasisPoints,
      });
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  isMinted(assetId: AssetId): boolean {
    return this.registry.exists(assetId);
  }

  get transferValidator(): TransferValidator | undefined {
    return this._validator;
  }

  /**
   * Royalty owed on a sale of any wrapped asset, rounded down.
   * No configured royalty means nothing is owed.
   */
  royaltyInfo(_assetId: AssetId, salePrice: bigint): RoyaltyQuote {
    if (this._royalty === undefined) {
      return { receiver: NULL_ADDRESS, amount: 0n };
    }
    return {
      receiver: this._royalty.receiver,
      amount: (salePrice * BigInt(this._royalty.feeBasisPoints)) / BigInt(MAX_BASIS_POINTS),
    };
  }

  status(): IssuerStatus {
    return {
      ...this.policy.snapshot(),
      validator: this._validator?.id ?? null,
      royalty: this._royalty ?? null,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _checkTransfer(ctx: TransferContext): void {
    const bridgeSupplyChange =
      ctx.operator === this.address && (ctx.from === NULL_ADDRESS || ctx.to === NULL_ADDRESS);
    const validator = this._validator;
    if (bridgeSupplyChange || validator === undefined) return;

    let allowed: boolean;
    try {
      allowed = validator.validateTransfer(ctx);
    } catch (err) {
      throw new BridgeError("TRANSFER_REJECTED", `Transfer validator "${validator.id}" failed`, {
        cause: err,
      });
    }
    if (!allowed) {
      throw new BridgeError(
        "TRANSFER_REJECTED",
        `Transfer validator "${validator.id}" rejected moving asset ` +
          `${ctx.assetId.toString()} from ${ctx.from} to ${ctx.to}`,
      );
    }
  }
}

function assertRoyalty(royalty: RoyaltyConfig): void {
  const bps = royalty.feeBasisPoints;
  if (!Number.isInteger(bps) || bps < 0 || bps > MAX_BASIS_POINTS) {
    throw new BridgeError(
      "INVALID_ROYALTY",
      `Royalty must be an integer between 0 and ${MAX_BASIS_POINTS} basis points, got ${bps}`,
    );
  }
  if (royalty.receiver === NULL_ADDRESS) {
    throw new BridgeError("NULL_RECIPIENT", "Royalty receiver must not be the null address");
  }
}
