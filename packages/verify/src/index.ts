/**
 * @relaymint/verify — Custody audits for Relaymint deployments.
 *
 * Observes a deployment, checks that every asset has exactly one
 * live representation, and hashes the observed state so two runs of
 * the same operations can be compared.
 *
 * Core exports:
 * - observeNetwork — snapshot every ledger and the in-flight set
 * - auditCustodyInvariants — run all invariant checks
 * - computeNetworkStateHash — content-addressed state digest
 */

// Observation
export { observeNetwork } from "./observe.js";

// Custody invariants
export {
  checkSingleLiveness,
  checkLockConsistency,
  checkEscrowConservation,
  auditCustodyInvariants,
} from "./custody-invariants.js";

// State hash
export {
  computeNetworkStateHash,
  diffNetworkStateHashes,
  hashInFlight,
  hashLedgerObservation,
} from "./state-hash.js";

// Types
export type {
  AssetHolding,
  EscrowObservation,
  InFlightMessage,
  InvariantAuditResult,
  InvariantCheckResult,
  LedgerObservation,
  NetworkObservation,
  NetworkStateHash,
} from "./types.js";
