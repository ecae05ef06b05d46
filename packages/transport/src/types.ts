/**
 * @relaymint/transport domain types.
 *
 * Cross-ledger messaging types for:
 * - Sending an encoded payload from one role to its counterpart
 * - Quoting the delivery cost of a payload
 * - Receiving authenticated deliveries
 *
 * The transport authenticates the source ledger and sending address.
 * It promises neither ordering nor exactly-once delivery.
 */

import type {
  Address,
  LedgerId,
  MessageDelivery,
  MessageHandle,
} from "@relaymint/types";

// =============================================================================
// Sending
// =============================================================================

/**
 * Everything the transport needs to accept a message.
 */
export interface SendRequest {
  readonly sourceLedger: LedgerId;
  readonly destinationLedger: LedgerId;

  /** Address of the sending role (attested on delivery) */
  readonly sender: Address;

  /** Encoded payload */
  readonly payload: string;

  /** Native units available to pay for delivery */
  readonly feeBudget: bigint;

  /** Where the unused part of `feeBudget` is returned */
  readonly refundAddress: Address;
}

/**
 * A cross-ledger messaging transport.
 */
export interface MessagingTransport {
  /** Delivery cost in native units of the source ledger. */
  quote(destinationLedger: LedgerId, payload: string): bigint;

  /** Accept a message for delivery. Throws if the budget does not cover the quote. */
  send(request: SendRequest): MessageHandle;
}

// =============================================================================
// Receiving
// =============================================================================

/**
 * Implemented by every role that accepts inbound messages.
 * Throwing rejects the delivery; the transport may retry it later.
 */
export interface MessageReceiver {
  receive(delivery: MessageDelivery): void;
}

// =============================================================================
// Envelope
// =============================================================================

/**
 * A message as the transport stores it between send and delivery.
 */
export interface Envelope {
  readonly messageId: string;
  readonly sourceLedger: LedgerId;
  readonly destinationLedger: LedgerId;
  readonly sender: Address;
  readonly nonce: number;
  readonly payload: string;
  readonly deliveryCost: bigint;
}

/**
 * Outcome of one delivery attempt.
 */
export type DeliveryResult =
  | { readonly messageId: string; readonly status: "delivered"; readonly attempt: number }
  | {
      readonly messageId: string;
      readonly status: "failed";
      readonly attempt: number;
      readonly error: unknown;
    };

// =============================================================================
// Errors
// =============================================================================

export type TransportErrorCode =
  | "UNKNOWN_DESTINATION"
  | "INSUFFICIENT_BUDGET"
  | "UNKNOWN_MESSAGE"
  | "NOT_DELIVERED"
  | "ALREADY_CONNECTED"
  | "MALFORMED_PAYLOAD"
  | "REFUND_FAILED";

export class TransportError extends Error {
  public readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
  }
}
