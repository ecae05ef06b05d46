/**
 * Common role plumbing.
 *
 * Both roles delegate administration to their policy and price
 * bridge-outs through their dispatcher. Subclasses supply debit,
 * credit and emergency recovery.
 */

import type { Logger } from "pino";
import type {
  Address,
  AssetId,
  EventSource,
  LedgerId,
  MessageDelivery,
} from "@relaymint/types";
import { NULL_ADDRESS } from "@relaymint/types";
import type { AssetRegistry, PaymentChannel, PayoutChannel } from "@relaymint/registry";
import type { MessagingTransport } from "@relaymint/transport";
import { MessageDispatcher } from "./dispatch.js";
import { BridgeError } from "./errors.js";
import type { FeeScheduleUpdate } from "./fee-schedule.js";
import { BridgePolicy } from "./policy.js";
import type {
  BridgeOutOptions,
  BridgeQuote,
  BridgeReceipt,
  BridgeableRole,
  RoleStatus,
} from "./types.js";

/**
 * Options shared by both role constructors.
 */
export interface RoleOptions {
  readonly ledgerId: LedgerId;
  /** The role's own address in its registry */
  readonly address: Address;
  readonly admin: Address;
  readonly transport: MessagingTransport;
  /** Pays out withdrawn fees */
  readonly payouts: PayoutChannel;
  /** Funds bridge-outs from the caller's balance */
  readonly payments: PaymentChannel;
  readonly feeSchedule?: FeeScheduleUpdate | undefined;
  readonly trustedRemotes?: Readonly<Record<LedgerId, Address>> | undefined;
  readonly logger?: Logger | undefined;
}

export abstract class BridgeRole implements BridgeableRole {
  readonly kind: EventSource;
  readonly ledgerId: LedgerId;
  readonly address: Address;
  readonly policy: BridgePolicy;
  protected readonly dispatcher: MessageDispatcher;

  protected constructor(
    kind: EventSource,
    options: RoleOptions,
    protected readonly registry: AssetRegistry,
  ) {
    if (registry.ledgerId !== options.ledgerId) {
      throw new BridgeError(
        "REGISTRY_FAILED",
        `Registry serves "${registry.ledgerId}", role is on "${options.ledgerId}"`,
      );
    }
    if (options.address === NULL_ADDRESS) {
      throw new BridgeError("NULL_RECIPIENT", "A role cannot live at the null address");
    }

    this.kind = kind;
    this.ledgerId = options.ledgerId;
    this.address = options.address;
    this.policy = new BridgePolicy({
      source: kind,
      ledgerId: options.ledgerId,
      address: options.address,
      admin: options.admin,
      payouts: options.payouts,
      payments: options.payments,
      feeSchedule: options.feeSchedule,
      trustedRemotes: options.trustedRemotes,
      logger: options.logger,
    });
    this.dispatcher = new MessageDispatcher(this.policy, options.transport);
  }

  abstract bridgeOut(
    caller: Address,
    assetId: AssetId,
    destination: LedgerId,
    payment: bigint,
    options?: BridgeOutOptions,
  ): BridgeReceipt;

  abstract receive(delivery: MessageDelivery): void;

  abstract emergencyRecover(caller: Address, assetId: AssetId, recipient: Address): void;

  abstract status(): RoleStatus;

  /**
   * Price a bridge-out of `assetId` by its current holder.
   */
  quoteBridge(destination: LedgerId, assetId: AssetId): BridgeQuote {
    const holder = this.registry.exists(assetId) ? this.registry.ownerOf(assetId) : NULL_ADDRESS;
    return this.dispatcher.quote(destination, {
      version: 1,
      assetId,
      sender: holder,
      recipient: holder,
    });
  }

  /** True while this role holds `assetId` in its registry. */
  holds(assetId: AssetId): boolean {
    return this.registry.exists(assetId) && this.registry.ownerOf(assetId) === this.address;
  }

  // ─── Administration ──────────────────────────────────────────────────

  pause(caller: Address): void {
    this.policy.pause(caller);
  }

  unpause(caller: Address): void {
    this.policy.unpause(caller);
  }

  setFeeSchedule(caller: Address, update: FeeScheduleUpdate): void {
    this.policy.setFeeSchedule(caller, update);
  }

  setTrustedRemote(caller: Address, ledgerId: LedgerId, remote: Address | undefined): void {
    this.policy.setTrustedRemote(caller, ledgerId, remote);
  }

  withdrawFees(caller: Address, recipient: Address): bigint {
    return this.policy.withdrawFees(caller, recipient);
  }

  // ─── Shared checks ───────────────────────────────────────────────────

  /**
   * Resolve recipient and refund address, and check the debit
   * preconditions every role shares.
   */
  protected resolveOutbound(
    caller: Address,
    assetId: AssetId,
    options: BridgeOutOptions,
  ): { holder: Address; recipient: Address; refundAddress: Address } {
    this.policy.assertActive();

    const recipient = options.recipient ?? caller;
    const refundAddress = options.refundAddress ?? caller;
    this.policy.assertRecipient(recipient);
    this.policy.assertRecipient(refundAddress);

    if (!this.registry.exists(assetId)) {
      throw new BridgeError(
        "NOT_HELD",
        `Asset ${assetId.toString()} does not exist on "${this.ledgerId}"`,
      );
    }
    return { holder: this.registry.ownerOf(assetId), recipient, refundAddress };
  }

  protected assertAuthorized(caller: Address, assetId: AssetId): void {
    if (!this.registry.isAuthorized(caller, assetId)) {
      throw new BridgeError(
        "UNAUTHORIZED_CALLER",
        `${caller} is neither the owner nor an approved operator of asset ${assetId.toString()}`,
      );
    }
  }

  protected assertHolds(assetId: AssetId): void {
    if (!this.holds(assetId)) {
      throw new BridgeError(
        "NOT_CUSTODIED",
        `Asset ${assetId.toString()} is not held by the ${this.kind} on "${this.ledgerId}"`,
      );
    }
  }
}
