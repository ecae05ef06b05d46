/**
 * @relaymint/transport — In-memory messaging transport.
 *
 * Holds sent messages in a queue until the caller decides to deliver
 * them. Delivery order is entirely under the caller's control, which
 * is how tests reproduce the at-least-once, unordered channel the
 * bridge must tolerate:
 * - deliverNext() / deliverAll() — queue order
 * - deliver(id) — any pending message, in any order
 * - redeliver(id) — duplicate delivery of an already delivered message
 *
 * A delivery whose receiver throws stays pending and can be retried.
 *
 * Properties:
 * - Source ledger and sender are attested from the send call, never
 *   from the payload
 * - Unused delivery budget is refunded through the source ledger's
 *   refund channel when one is configured
 */

import type { Address, LedgerId, MessageHandle } from "@relaymint/types";
import { computeMessageId } from "./codec.js";
import type {
  DeliveryResult,
  Envelope,
  MessageReceiver,
  MessagingTransport,
  SendRequest,
} from "./types.js";
import { TransportError } from "./types.js";

/**
 * Receives refunds of unused delivery budget on a source ledger.
 */
export interface RefundChannel {
  send(to: Address, amount: bigint): void;
}

export interface InMemoryTransportOptions {
  /** Delivery cost charged per message. Default: 0 */
  readonly deliveryCost?: bigint | ((destinationLedger: LedgerId, payload: string) => bigint);
  /** Refund channel per source ledger */
  readonly refundChannels?: ReadonlyMap<LedgerId, RefundChannel>;
}

interface Endpoint {
  readonly address: Address;
  readonly receiver: MessageReceiver;
}

interface QueuedMessage {
  readonly envelope: Envelope;
  attempts: number;
  delivered: boolean;
  lastError?: unknown;
}

export class InMemoryTransport implements MessagingTransport {
  private readonly _endpoints = new Map<LedgerId, Endpoint>();
  private readonly _messages = new Map<string, QueuedMessage>();
  private readonly _deliveryCost: InMemoryTransportOptions["deliveryCost"];
  private readonly _refundChannels: ReadonlyMap<LedgerId, RefundChannel>;
  private _nonce = 0;

  constructor(options: InMemoryTransportOptions = {}) {
    this._deliveryCost = options.deliveryCost;
    this._refundChannels = options.refundChannels ?? new Map();
  }

  // ─── Wiring ──────────────────────────────────────────────────────────

  /**
   * Register the role that receives messages addressed to `ledgerId`.
   */
  connect(ledgerId: LedgerId, address: Address, receiver: MessageReceiver): void {
    if (this._endpoints.has(ledgerId)) {
      throw new TransportError(
        "ALREADY_CONNECTED",
        `A receiver is already connected for ledger "${ledgerId}"`,
      );
    }
    this._endpoints.set(ledgerId, { address, receiver });
  }

  isConnected(ledgerId: LedgerId): boolean {
    return this._endpoints.has(ledgerId);
  }

  /**
   * Address of the role connected for `ledgerId`.
   */
  addressOf(ledgerId: LedgerId): Address {
    return this._endpoint(ledgerId).address;
  }

  // ─── MessagingTransport ──────────────────────────────────────────────

  quote(destinationLedger: LedgerId, payload: string): bigint {
    this._endpoint(destinationLedger);
    const cost = this._deliveryCost;
    if (cost === undefined) return 0n;
    return typeof cost === "bigint" ? cost : cost(destinationLedger, payload);
  }

  send(request: SendRequest): MessageHandle {
    const deliveryCost = this.quote(request.destinationLedger, request.payload);
    if (request.feeBudget < deliveryCost) {
      throw new TransportError(
        "INSUFFICIENT_BUDGET",
        `Delivery to "${request.destinationLedger}" costs ${deliveryCost.toString()}, budget is ${request.feeBudget.toString()}`,
      );
    }

    const refunded = request.feeBudget - deliveryCost;
    const refundChannel = this._refundChannels.get(request.sourceLedger);
    if (refunded > 0n && refundChannel !== undefined) {
      try {
        refundChannel.send(request.refundAddress, refunded);
      } catch (err) {
        throw new TransportError(
          "REFUND_FAILED",
          `Refunding ${refunded.toString()} to ${request.refundAddress} failed`,
          { cause: err },
        );
      }
    }

    const nonce = ++this._nonce;
    const messageId = computeMessageId({
      sourceLedger: request.sourceLedger,
      destinationLedger: request.destinationLedger,
      sender: request.sender,
      nonce,
      payload: request.payload,
    });

    const envelope: Envelope = {
      messageId,
      sourceLedger: request.sourceLedger,
      destinationLedger: request.destinationLedger,
      sender: request.sender,
      nonce,
      payload: request.payload,
      deliveryCost,
    };
    this._messages.set(messageId, { envelope, attempts: 0, delivered: false });

    return {
      messageId,
      sourceLedger: request.sourceLedger,
      destinationLedger: request.destinationLedger,
      deliveryCost,
      refunded: refundChannel !== undefined ? refunded : 0n,
    };
  }

  // ─── Inspection ──────────────────────────────────────────────────────

  /**
   * Messages sent but not yet successfully delivered, in send order.
   */
  pending(): readonly Envelope[] {
    return [...this._messages.values()]
      .filter((m) => !m.delivered)
      .map((m) => m.envelope);
  }

  /**
   * Messages delivered at least once, in send order.
   */
  delivered(): readonly Envelope[] {
    return [...this._messages.values()]
      .filter((m) => m.delivered)
      .map((m) => m.envelope);
  }

  /**
   * Last error a receiver threw for this message, if any.
   */
  lastError(messageId: string): unknown {
    return this._message(messageId).lastError;
  }

  get sentCount(): number {
    return this._messages.size;
  }

  // ─── Delivery Control ────────────────────────────────────────────────

  /**
   * Deliver a pending message.
   */
  deliver(messageId: string): DeliveryResult {
    const message = this._message(messageId);
    if (message.delivered) {
      throw new TransportError(
        "UNKNOWN_MESSAGE",
        `Message ${messageId} was already delivered; use redeliver()`,
      );
    }
    return this._attempt(message);
  }

  /**
   * Deliver the oldest pending message. Returns undefined if none.
   */
  deliverNext(): DeliveryResult | undefined {
    const next = [...this._messages.values()].find((m) => !m.delivered);
    return next === undefined ? undefined : this._attempt(next);
  }

  /**
   * Attempt every currently pending message once, in send order.
   */
  deliverAll(): readonly DeliveryResult[] {
    const batch = [...this._messages.values()].filter((m) => !m.delivered);
    return batch.map((m) => this._attempt(m));
  }

  /**
   * Deliver an already delivered message again (duplicate delivery).
   */
  redeliver(messageId: string): DeliveryResult {
    const message = this._message(messageId);
    if (!message.delivered) {
      throw new TransportError(
        "NOT_DELIVERED",
        `Message ${messageId} has not been delivered yet`,
      );
    }
    return this._attempt(message);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _attempt(message: QueuedMessage): DeliveryResult {
    const { envelope } = message;
    const endpoint = this._endpoint(envelope.destinationLedger);
    message.attempts++;
    const attempt = message.attempts;

    try {
      endpoint.receiver.receive({
        messageId: envelope.messageId,
        sourceLedger: envelope.sourceLedger,
        sender: envelope.sender,
        payload: envelope.payload,
        attempt,
      });
    } catch (error) {
      message.lastError = error;
      return { messageId: envelope.messageId, status: "failed", attempt, error };
    }

    message.delivered = true;
    message.lastError = undefined;
    return { messageId: envelope.messageId, status: "delivered", attempt };
  }

  private _endpoint(ledgerId: LedgerId): Endpoint {
    const endpoint = this._endpoints.get(ledgerId);
    if (endpoint === undefined) {
      throw new TransportError(
        "UNKNOWN_DESTINATION",
        `No receiver connected for ledger "${ledgerId}"`,
      );
    }
    return endpoint;
  }

  private _message(messageId: string): QueuedMessage {
    const message = this._messages.get(messageId);
    if (message === undefined) {
      throw new TransportError("UNKNOWN_MESSAGE", `Unknown message: ${messageId}`);
    }
    return message;
  }
}
