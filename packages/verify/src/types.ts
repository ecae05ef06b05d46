/**
 * @relaymint/verify — Types for custody verification.
 *
 * These types define the audit protocol:
 * - NetworkObservation: a point-in-time picture of every ledger and
 *   every message still in flight
 * - InvariantCheckResult: pass/fail verdict with structured evidence
 * - NetworkStateHash: content-addressed digest of an observation
 *
 * Observations carry asset ids and amounts as decimal strings so they
 * can be canonicalized, hashed and shipped as JSON.
 */

import type { Address, EventSource, LedgerId } from "@relaymint/types";

// =============================================================================
// Observation
// =============================================================================

/**
 * One asset record in a ledger's registry.
 */
export interface AssetHolding {
  readonly assetId: string;
  readonly owner: Address;
}

/**
 * Fee escrow figures of one role.
 */
export interface EscrowObservation {
  readonly balance: string;
  readonly totalCollected: string;
  readonly totalWithdrawn: string;
}

/**
 * Everything the audit needs to know about one ledger.
 */
export interface LedgerObservation {
  readonly ledgerId: LedgerId;

  /** Which bridge role runs on this ledger */
  readonly role: EventSource;

  /** Address of that role */
  readonly roleAddress: Address;

  /** Every asset the registry knows, sorted by id */
  readonly holdings: readonly AssetHolding[];

  /** Asset ids with a lock entry (always empty for an issuer) */
  readonly locks: readonly string[];

  readonly escrow: EscrowObservation;
}

/**
 * A bridge message sent but not yet successfully delivered.
 */
export interface InFlightMessage {
  readonly messageId: string;
  readonly sourceLedger: LedgerId;
  readonly destinationLedger: LedgerId;
  readonly assetId: string;
}

/**
 * A point-in-time picture of a whole bridge deployment.
 */
export interface NetworkObservation {
  /** Ledger the originals live on */
  readonly originLedger: LedgerId;

  /** Every ledger, origin first */
  readonly ledgers: readonly LedgerObservation[];

  /** Messages the transport still holds, in send order */
  readonly inFlight: readonly InFlightMessage[];

  /** ISO 8601 timestamp */
  readonly observedAt: string;
}

// =============================================================================
// Audit
// =============================================================================

/**
 * Result of a single invariant check.
 */
export interface InvariantCheckResult {
  /** Name of the invariant */
  readonly invariant: string;

  /** Whether the invariant holds */
  readonly holds: boolean;

  /** Evidence of violations (empty if holds) */
  readonly violations: readonly string[];
}

/**
 * Result of running all invariant checks.
 */
export interface InvariantAuditResult {
  readonly verdict: "PASS" | "FAIL";
  readonly checks: readonly InvariantCheckResult[];
  readonly totalViolations: number;

  /** ISO 8601 timestamp */
  readonly auditedAt: string;
}

// =============================================================================
// State Hash
// =============================================================================

/**
 * A single SHA-256 digest covering the structural state of every
 * ledger and the in-flight set.
 *
 * Wall-clock fields are excluded, so two deployments driven through
 * the same operations hash identically.
 */
export interface NetworkStateHash {
  /** SHA-256 hex digest (64 characters, lowercase) */
  readonly hash: string;

  /** Per-ledger hashes, for pinpointing divergence */
  readonly ledgerHashes: Readonly<Record<LedgerId, string>>;

  /** Hash of the in-flight set */
  readonly inFlightHash: string;
}
