/**
 * Message dispatch — the role's side of the messaging transport.
 *
 * Outbound: price a bridge-out, split the payment into fee and
 * delivery budget, and hand the encoded message to the transport.
 * Inbound: authenticate the delivery against the trusted remote for
 * its source ledger, decode it, and refuse a message applied before.
 */

import type {
  Address,
  BridgeMessage,
  LedgerId,
  MessageDelivery,
  MessageHandle,
} from "@relaymint/types";
import { decodeMessage, encodeMessage } from "@relaymint/transport";
import type { MessagingTransport } from "@relaymint/transport";
import { BridgeError, toBridgeError } from "./errors.js";
import type { UndoJournal } from "./journal.js";
import type { BridgePolicy } from "./policy.js";
import type { BridgeQuote } from "./types.js";

/**
 * A bridge-out that passed every payment check and is ready to send.
 */
export interface PreparedMessage {
  readonly destination: LedgerId;
  readonly payload: string;
  readonly fee: bigint;
  readonly deliveryCost: bigint;
  readonly deliveryBudget: bigint;
}

export class MessageDispatcher {
  private readonly _applied = new Set<string>();

  constructor(
    private readonly policy: BridgePolicy,
    private readonly transport: MessagingTransport,
  ) {}

  quote(destination: LedgerId, message: BridgeMessage): BridgeQuote {
    return this._price(destination, encodeMessage(message));
  }

  /**
   * Check `payment` against the fee and the transport quote.
   *
   * @throws {BridgeError} UNSUPPORTED_DESTINATION, INSUFFICIENT_FEE or INSUFFICIENT_PAYMENT
   */
  prepare(destination: LedgerId, payment: bigint, message: BridgeMessage): PreparedMessage {
    const payload = encodeMessage(message);
    const quote = this._price(destination, payload);

    if (payment < quote.fee) {
      throw new BridgeError(
        "INSUFFICIENT_FEE",
        `Bridging to "${destination}" requires a fee of ${quote.fee.toString()}, got ${payment.toString()}`,
      );
    }
    const deliveryBudget = payment - quote.fee;
    if (deliveryBudget < quote.deliveryCost) {
      throw new BridgeError(
        "INSUFFICIENT_PAYMENT",
        `Delivery to "${destination}" costs ${quote.deliveryCost.toString()}, ` +
          `${deliveryBudget.toString()} left after the fee`,
      );
    }

    return {
      destination,
      payload,
      fee: quote.fee,
      deliveryCost: quote.deliveryCost,
      deliveryBudget,
    };
  }

  send(prepared: PreparedMessage, refundAddress: Address): MessageHandle {
    return this.transport.send({
      sourceLedger: this.policy.ledgerId,
      destinationLedger: prepared.destination,
      sender: this.policy.address,
      payload: prepared.payload,
      feeBudget: prepared.deliveryBudget,
      refundAddress,
    });
  }

  /**
   * Authenticate and decode an inbound delivery.
   *
   * @throws {BridgeError} UNTRUSTED_SOURCE or MALFORMED_MESSAGE
   */
  accept(delivery: MessageDelivery): BridgeMessage {
    this.policy.assertTrustedSource(delivery.sourceLedger, delivery.sender);
    try {
      return decodeMessage(delivery.payload);
    } catch (err) {
      throw toBridgeError(err);
    }
  }

  /**
   * Mark a delivery as applied. Custody checks catch a duplicate that
   * arrives while its effect is still in place; this catches one that
   * arrives after the asset has moved on and come back.
   *
   * @throws {BridgeError} MESSAGE_REPLAYED
   */
  consume(messageId: string, journal: UndoJournal): void {
    if (this._applied.has(messageId)) {
      throw new BridgeError("MESSAGE_REPLAYED", `Message ${messageId} was already applied`);
    }
    this._applied.add(messageId);
    journal.record(() => {
      this._applied.delete(messageId);
    });
  }

  private _price(destination: LedgerId, payload: string): BridgeQuote {
    if (this.policy.trustedRemote(destination) === undefined) {
      throw new BridgeError(
        "UNSUPPORTED_DESTINATION",
        `No trusted counterpart registered for "${destination}"`,
      );
    }
    const fee = this.policy.fees.requiredFee(destination);

    let deliveryCost: bigint;
    try {
      deliveryCost = this.transport.quote(destination, payload);
    } catch (err) {
      throw toBridgeError(err);
    }

    return { fee, deliveryCost, total: fee + deliveryCost };
  }
}
