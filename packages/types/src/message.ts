/**
 * Message Types
 *
 * What travels between bridge roles over the messaging transport.
 *
 * The transport guarantees authenticity of `sourceLedger` and `sender`.
 * It does not guarantee ordering or exactly-once delivery.
 */

import type { Address, AssetId, LedgerId } from "./ledger.js";

/**
 * The bridge payload: which asset crossed, and who gets it on arrival.
 */
export interface BridgeMessage {
  /** Wire format version */
  readonly version: 1;

  readonly assetId: AssetId;

  /** Holder that initiated the transfer on the source ledger */
  readonly sender: Address;

  /** Recipient on the destination ledger */
  readonly recipient: Address;
}

/**
 * An authenticated inbound delivery handed to a receiving role.
 */
export interface MessageDelivery {
  /** Content-addressed message identifier */
  readonly messageId: string;

  /** Ledger the message originated on (attested by the transport) */
  readonly sourceLedger: LedgerId;

  /** Role address that sent the message (attested by the transport) */
  readonly sender: Address;

  /** Encoded payload, opaque to the transport */
  readonly payload: string;

  /** 1 on first delivery, incremented on every redelivery */
  readonly attempt: number;
}

/**
 * Handle returned by the transport when a message is accepted.
 */
export interface MessageHandle {
  readonly messageId: string;
  readonly sourceLedger: LedgerId;
  readonly destinationLedger: LedgerId;

  /** Native units the transport charged for delivery */
  readonly deliveryCost: bigint;

  /** Native units returned to the refund address */
  readonly refunded: bigint;
}
