/**
 * @relaymint/verify — NetworkStateHash computation.
 *
 * Produces a single content-addressed hash covering a deployment.
 *
 * Algorithm:
 * 1. Canonicalize each ledger observation (RFC 8785 / JCS)
 * 2. SHA-256 each canonical form → ledger hash
 * 3. Canonicalize and hash the in-flight set
 * 4. SHA-256 the canonical tuple of all hashes → NetworkStateHash
 *
 * `observedAt` is wall-clock metadata and is not hashed.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { InFlightMessage, LedgerObservation, NetworkObservation, NetworkStateHash } from "./types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function hashLedgerObservation(ledger: LedgerObservation): string {
  return sha256(canonicalize(ledger));
}

export function hashInFlight(messages: readonly InFlightMessage[]): string {
  return sha256(canonicalize(messages));
}

/**
 * Compute the NetworkStateHash of an observation.
 */
export function computeNetworkStateHash(observation: NetworkObservation): NetworkStateHash {
  const ledgerHashes: Record<string, string> = {};
  for (const ledger of observation.ledgers) {
    ledgerHashes[ledger.ledgerId] = hashLedgerObservation(ledger);
  }
  const inFlightHash = hashInFlight(observation.inFlight);

  const hash = sha256(
    canonicalize({
      originLedger: observation.originLedger,
      ledgers: ledgerHashes,
      inFlight: inFlightHash,
    }),
  );

  return { hash, ledgerHashes, inFlightHash };
}

/**
 * Names of the ledgers whose hashes differ between two states, plus
 * "in-flight" when the pending sets differ.
 */
export function diffNetworkStateHashes(a: NetworkStateHash, b: NetworkStateHash): string[] {
  const ledgers = new Set([...Object.keys(a.ledgerHashes), ...Object.keys(b.ledgerHashes)]);
  const diverged = [...ledgers]
    .filter((ledgerId) => a.ledgerHashes[ledgerId] !== b.ledgerHashes[ledgerId])
    .sort();
  if (a.inFlightHash !== b.inFlightHash) diverged.push("in-flight");
  return diverged;
}
