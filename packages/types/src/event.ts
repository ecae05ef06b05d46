/**
 * Event Types
 *
 * Every committed bridge operation is announced as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are only emitted for committed operations; a rejected
 *   operation emits nothing
 * - Payload values are JSON-safe (bigints rendered as decimal strings)
 */

import type { LedgerId } from "./ledger.js";

/**
 * Which role emitted the event.
 */
export type EventSource = "custodian" | "issuer";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who caused this event */
  readonly actor: string;

  /** Groups the events of one operation (e.g. a message id) */
  readonly correlationId: string;

  /** Ledger the emitting role lives on */
  readonly ledgerId: LedgerId;

  readonly source: EventSource;
}

/**
 * Known bridge event types.
 */
export type BridgeEventType =
  | "asset.locked"
  | "asset.unlocked"
  | "asset.burned"
  | "asset.minted"
  | "fee.collected"
  | "fees.withdrawn"
  | "fee-schedule.updated"
  | "bridge.paused"
  | "bridge.unpaused"
  | "remote.trusted"
  | "emergency.recovered"
  | "validator.updated"
  | "royalty.updated";

/**
 * A domain event in the bridge.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  readonly type: BridgeEventType;

  readonly metadata: EventMetadata;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, string | number | boolean | null>>;
}
