/**
 * Custody Invariant Checker
 *
 * Validates structural invariants over a NetworkObservation:
 * - Single liveness (each original has exactly one representation)
 * - Lock consistency (locks, wrapped copies and custody agree)
 * - Escrow conservation (collected − withdrawn = balance)
 *
 * Design:
 * - Pure structural validation, no access to live roles
 * - Each check returns pass/fail with evidence
 * - Composable: run individual checks or all at once
 *
 * Representations of an asset are: the origin record when a holder
 * other than the custodian owns it, any wrapped record on a destination,
 * and any in-flight message carrying it. An original the custodian
 * holds without a lock (sent to it outside the bridge) also counts as
 * the origin representation, since emergency recovery can release it.
 */

import type {
  InvariantAuditResult,
  InvariantCheckResult,
  LedgerObservation,
  NetworkObservation,
} from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function originOf(observation: NetworkObservation): LedgerObservation | undefined {
  return observation.ledgers.find((l) => l.ledgerId === observation.originLedger);
}

function destinationsOf(observation: NetworkObservation): readonly LedgerObservation[] {
  return observation.ledgers.filter((l) => l.ledgerId !== observation.originLedger);
}

function missingOrigin(invariant: string, observation: NetworkObservation): InvariantCheckResult {
  return {
    invariant,
    holds: false,
    violations: [`Origin ledger "${observation.originLedger}" is not observed`],
  };
}

// =============================================================================
// Individual Invariant Checks
// =============================================================================

/**
 * Check single liveness.
 *
 * Every asset known anywhere must have exactly one representation
 * across the origin, all destinations and the in-flight set.
 */
export function checkSingleLiveness(observation: NetworkObservation): InvariantCheckResult {
  const origin = originOf(observation);
  if (origin === undefined) return missingOrigin("single_liveness", observation);

  const locked = new Set(origin.locks);
  const representations = new Map<string, string[]>();
  const note = (assetId: string, where: string) => {
    const list = representations.get(assetId) ?? [];
    list.push(where);
    representations.set(assetId, list);
  };

  for (const holding of origin.holdings) {
    const custodied = holding.owner === origin.roleAddress && locked.has(holding.assetId);
    if (custodied) {
      representations.set(holding.assetId, representations.get(holding.assetId) ?? []);
    } else {
      note(holding.assetId, `${origin.ledgerId}(${holding.owner})`);
    }
  }
  for (const ledger of destinationsOf(observation)) {
    for (const holding of ledger.holdings) {
      note(holding.assetId, `${ledger.ledgerId}(${holding.owner})`);
    }
  }
  for (const message of observation.inFlight) {
    note(message.assetId, `in-flight(${message.messageId})`);
  }

  const violations: string[] = [];
  for (const [assetId, places] of representations) {
    if (places.length === 0) {
      violations.push(`Asset ${assetId} has no live representation`);
    } else if (places.length > 1) {
      violations.push(
        `Asset ${assetId} has ${places.length} live representations: ${places.join(", ")}`,
      );
    }
  }

  return {
    invariant: "single_liveness",
    holds: violations.length === 0,
    violations,
  };
}

/**
 * Check lock consistency.
 *
 * - A lock entry implies the custodian holds the original
 * - A wrapped record or an in-flight message implies a lock entry
 */
export function checkLockConsistency(observation: NetworkObservation): InvariantCheckResult {
  const origin = originOf(observation);
  if (origin === undefined) return missingOrigin("lock_consistency", observation);

  const violations: string[] = [];
  const owners = new Map(origin.holdings.map((h) => [h.assetId, h.owner]));
  const locked = new Set(origin.locks);

  for (const assetId of origin.locks) {
    const owner = owners.get(assetId);
    if (owner === undefined) {
      violations.push(`Asset ${assetId} is locked but does not exist on ${origin.ledgerId}`);
    } else if (owner !== origin.roleAddress) {
      violations.push(`Asset ${assetId} is locked but held by ${owner}`);
    }
  }

  for (const ledger of destinationsOf(observation)) {
    for (const holding of ledger.holdings) {
      if (!locked.has(holding.assetId)) {
        violations.push(
          `Wrapped asset ${holding.assetId} on ${ledger.ledgerId} has no lock on ${origin.ledgerId}`,
        );
      }
    }
  }

  for (const message of observation.inFlight) {
    if (!locked.has(message.assetId)) {
      violations.push(
        `Message ${message.messageId} carries asset ${message.assetId}, which has no lock on ${origin.ledgerId}`,
      );
    }
  }

  return {
    invariant: "lock_consistency",
    holds: violations.length === 0,
    violations,
  };
}

/**
 * Check escrow conservation.
 *
 * For every role: balance = totalCollected − totalWithdrawn, and no
 * figure is negative.
 */
export function checkEscrowConservation(observation: NetworkObservation): InvariantCheckResult {
  const violations: string[] = [];

  for (const ledger of observation.ledgers) {
    let balance: bigint;
    let collected: bigint;
    let withdrawn: bigint;
    try {
      balance = BigInt(ledger.escrow.balance);
      collected = BigInt(ledger.escrow.totalCollected);
      withdrawn = BigInt(ledger.escrow.totalWithdrawn);
    } catch {
      violations.push(`${ledger.ledgerId}: escrow figures are not integers`);
      continue;
    }

    if (balance < 0n || collected < 0n || withdrawn < 0n) {
      violations.push(`${ledger.ledgerId}: negative escrow figure`);
    }
    if (collected - withdrawn !== balance) {
      violations.push(
        `${ledger.ledgerId}: escrow balance ${balance.toString()} != ` +
        `collected ${collected.toString()} - withdrawn ${withdrawn.toString()}`,
      );
    }
  }

  return {
    invariant: "escrow_conservation",
    holds: violations.length === 0,
    violations,
  };
}

// =============================================================================
// Combined Audit
// =============================================================================

/**
 * Run all custody invariant checks.
 */
export function auditCustodyInvariants(observation: NetworkObservation): InvariantAuditResult {
  const checks = [
    checkSingleLiveness(observation),
    checkLockConsistency(observation),
    checkEscrowConservation(observation),
  ];

  const totalViolations = checks.reduce(
    (sum, c) => sum + c.violations.length,
    0,
  );

  return {
    verdict: totalViolations === 0 ? "PASS" : "FAIL",
    checks,
    totalViolations,
    auditedAt: new Date().toISOString(),
  };
}
