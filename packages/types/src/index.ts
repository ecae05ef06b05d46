/**
 * @relaymint/types — Shared domain types for the Relaymint packages.
 *
 * These types are used across all Relaymint packages:
 * - Ledger identity (assets, addresses, ledgers)
 * - Bridge messages and authenticated deliveries
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Ledger types
export type {
  LedgerId,
  Address,
  AssetId,
} from "./ledger.js";

export { NULL_ADDRESS } from "./ledger.js";

// Message types
export type {
  BridgeMessage,
  MessageDelivery,
  MessageHandle,
} from "./message.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  BridgeEventType,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isNullAddress,
  isLedgerId,
  isAssetId,
  isBridgeMessage,
  isMessageDelivery,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
