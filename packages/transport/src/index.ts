/**
 * @relaymint/transport — Cross-ledger messaging.
 *
 * The bridge sees messaging only through `MessagingTransport` and
 * `MessageReceiver`. This package provides:
 * - The canonical message codec and content-addressed message ids
 * - An in-memory transport with explicit, reorderable delivery
 */

// Codec
export { encodeMessage, decodeMessage, computeMessageId } from "./codec.js";
export type { MessageIdInput } from "./codec.js";

// In-memory transport
export { InMemoryTransport } from "./in-memory-transport.js";
export type { InMemoryTransportOptions, RefundChannel } from "./in-memory-transport.js";

// Types
export type {
  SendRequest,
  MessagingTransport,
  MessageReceiver,
  Envelope,
  DeliveryResult,
  TransportErrorCode,
} from "./types.js";

export { TransportError } from "./types.js";
