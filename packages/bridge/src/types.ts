/**
 * Bridge Types
 *
 * The shared surface of both bridge roles. The Origin Custodian and the
 * Destination Issuer differ only in how they debit and credit; fees,
 * pause, reentrancy and administration come from the embedded policy.
 */

import type {
  Address,
  AssetId,
  EventSource,
  LedgerId,
} from "@relaymint/types";
import type { MessageReceiver } from "@relaymint/transport";
import type { FeeScheduleUpdate, FeeScheduleView } from "./fee-schedule.js";
import type { FeeEscrowView } from "./fee-escrow.js";
import type { BridgePolicy, PauseState } from "./policy.js";

// =============================================================================
// Bridge-out
// =============================================================================

export interface BridgeOutOptions {
  /** Recipient on the destination ledger. Default: the caller */
  readonly recipient?: Address | undefined;
  /** Where unused delivery budget is refunded. Default: the caller */
  readonly refundAddress?: Address | undefined;
}

/**
 * What a bridge-out costs right now.
 */
export interface BridgeQuote {
  readonly fee: bigint;
  readonly deliveryCost: bigint;
  /** Minimum payment that succeeds */
  readonly total: bigint;
}

/**
 * Returned by a successful bridge-out.
 */
export interface BridgeReceipt {
  readonly messageId: string;
  readonly assetId: AssetId;
  readonly destination: LedgerId;
  readonly holder: Address;
  readonly recipient: Address;
  readonly fee: bigint;
  /** Part of the payment handed to the transport */
  readonly deliveryBudget: bigint;
  readonly deliveryCost: bigint;
  readonly refunded: bigint;
}

// =============================================================================
// Status
// =============================================================================

/**
 * JSON-safe snapshot of a role.
 */
export interface RoleStatus {
  readonly kind: EventSource;
  readonly ledgerId: LedgerId;
  readonly address: Address;
  readonly admin: Address;
  readonly state: PauseState;
  readonly escrow: FeeEscrowView;
  readonly feeSchedule: FeeScheduleView;
  readonly trustedRemotes: Readonly<Record<LedgerId, Address>>;
}

// =============================================================================
// Role
// =============================================================================

/**
 * A bridge role deployed on one ledger.
 */
export interface BridgeableRole extends MessageReceiver {
  readonly kind: EventSource;
  readonly ledgerId: LedgerId;
  readonly address: Address;
  readonly policy: BridgePolicy;

  /** Debit: lock or burn the asset and send it to `destination`, paid by the caller. */
  bridgeOut(
    caller: Address,
    assetId: AssetId,
    destination: LedgerId,
    payment: bigint,
    options?: BridgeOutOptions,
  ): BridgeReceipt;

  quoteBridge(destination: LedgerId, assetId: AssetId): BridgeQuote;

  /** Return an asset this role holds to `recipient`. Administrator only. */
  emergencyRecover(caller: Address, assetId: AssetId, recipient: Address): void;

  pause(caller: Address): void;
  unpause(caller: Address): void;
  setFeeSchedule(caller: Address, update: FeeScheduleUpdate): void;
  setTrustedRemote(caller: Address, ledgerId: LedgerId, remote: Address | undefined): void;
  withdrawFees(caller: Address, recipient: Address): bigint;

  status(): RoleStatus;
}
