/**
 * Runtime Type Guards
 *
 * Narrowing functions for bridge domain types, for consumers that hold
 * an `unknown` (event subscribers, external tooling). Payloads, HTTP
 * bodies and config are parsed with Zod schemas where they enter.
 */

import type { Address, AssetId, LedgerId } from "./ledger.js";
import { NULL_ADDRESS } from "./ledger.js";
import type { BridgeMessage, MessageDelivery } from "./message.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

export function isNullAddress(value: Address): boolean {
  return value === NULL_ADDRESS;
}

export function isLedgerId(value: unknown): value is LedgerId {
  return typeof value === "string" && value.length > 0;
}

export function isAssetId(value: unknown): value is AssetId {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Message guards
// =============================================================================

export function isBridgeMessage(value: unknown): value is BridgeMessage {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.version === 1 &&
    isAssetId(v.assetId) &&
    isAddress(v.sender) &&
    isAddress(v.recipient)
  );
}

export function isMessageDelivery(value: unknown): value is MessageDelivery {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.messageId === "string" &&
    isLedgerId(v.sourceLedger) &&
    isAddress(v.sender) &&
    typeof v.payload === "string" &&
    typeof v.attempt === "number" &&
    Number.isInteger(v.attempt) &&
    v.attempt >= 1
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["custodian", "issuer"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isLedgerId(v.ledgerId) &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
