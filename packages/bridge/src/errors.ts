/**
 * Bridge Errors
 *
 * Every rejected operation throws a BridgeError. The `kind` tells the
 * caller which class of failure occurred; the `code` names the reason.
 *
 * - PolicyViolation — the request is not allowed (paused, fee too low,
 *   wrong caller, null recipient, ...)
 * - InvariantViolation — the request contradicts custody state (credit
 *   for an asset that is not locked, mint of an asset that exists, ...)
 * - ExternalFailure — a collaborator failed (payout, transport, registry)
 *
 * Whatever the kind, the operation has been rolled back in full.
 */

import { RegistryError } from "@relaymint/registry";
import { TransportError } from "@relaymint/transport";

// =============================================================================
// Codes
// =============================================================================

export type BridgeErrorKind = "PolicyViolation" | "InvariantViolation" | "ExternalFailure";

export type BridgeErrorCode =
  // PolicyViolation
  | "PAUSED"
  | "INSUFFICIENT_FEE"
  | "INSUFFICIENT_PAYMENT"
  | "UNAUTHORIZED_CALLER"
  | "NOT_ADMIN"
  | "NULL_RECIPIENT"
  | "UNTRUSTED_SOURCE"
  | "UNSUPPORTED_DESTINATION"
  | "INVALID_FEE"
  | "INVALID_ROYALTY"
  | "INVALID_PAUSE_TRANSITION"
  | "REENTRANT_CALL"
  | "TRANSFER_REJECTED"
  | "MALFORMED_MESSAGE"
  | "NO_FEES"
  // InvariantViolation
  | "NOT_LOCKED"
  | "ALREADY_LOCKED"
  | "ALREADY_MINTED"
  | "NOT_HELD"
  | "NOT_CUSTODIED"
  | "MESSAGE_REPLAYED"
  // ExternalFailure
  | "WITHDRAWAL_FAILED"
  | "TRANSPORT_FAILED"
  | "REGISTRY_FAILED"
  | "ROLLBACK_FAILED";

export const ERROR_KINDS: Readonly<Record<BridgeErrorCode, BridgeErrorKind>> = {
  PAUSED: "PolicyViolation",
  INSUFFICIENT_FEE: "PolicyViolation",
  INSUFFICIENT_PAYMENT: "PolicyViolation",
  UNAUTHORIZED_CALLER: "PolicyViolation",
  NOT_ADMIN: "PolicyViolation",
  NULL_RECIPIENT: "PolicyViolation",
  UNTRUSTED_SOURCE: "PolicyViolation",
  UNSUPPORTED_DESTINATION: "PolicyViolation",
  INVALID_FEE: "PolicyViolation",
  INVALID_ROYALTY: "PolicyViolation",
  INVALID_PAUSE_TRANSITION: "PolicyViolation",
  REENTRANT_CALL: "PolicyViolation",
  TRANSFER_REJECTED: "PolicyViolation",
  MALFORMED_MESSAGE: "PolicyViolation",
  NO_FEES: "PolicyViolation",
  NOT_LOCKED: "InvariantViolation",
  ALREADY_LOCKED: "InvariantViolation",
  ALREADY_MINTED: "InvariantViolation",
  NOT_HELD: "InvariantViolation",
  NOT_CUSTODIED: "InvariantViolation",
  MESSAGE_REPLAYED: "InvariantViolation",
  WITHDRAWAL_FAILED: "ExternalFailure",
  TRANSPORT_FAILED: "ExternalFailure",
  REGISTRY_FAILED: "ExternalFailure",
  ROLLBACK_FAILED: "ExternalFailure",
};

// =============================================================================
// Error
// =============================================================================

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly kind: BridgeErrorKind;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
    this.kind = ERROR_KINDS[code];
  }
}

// =============================================================================
// Translation
// =============================================================================

const REGISTRY_CODES: Partial<Record<RegistryError["code"], BridgeErrorCode>> = {
  NOT_AUTHORIZED: "UNAUTHORIZED_CALLER",
  NONEXISTENT_ASSET: "NOT_HELD",
  ASSET_EXISTS: "ALREADY_MINTED",
  INVALID_RECIPIENT: "NULL_RECIPIENT",
  INSUFFICIENT_BALANCE: "INSUFFICIENT_PAYMENT",
};

const TRANSPORT_CODES: Partial<Record<TransportError["code"], BridgeErrorCode>> = {
  INSUFFICIENT_BUDGET: "INSUFFICIENT_PAYMENT",
  UNKNOWN_DESTINATION: "UNSUPPORTED_DESTINATION",
  MALFORMED_PAYLOAD: "MALFORMED_MESSAGE",
  REFUND_FAILED: "TRANSPORT_FAILED",
};

/**
 * Map anything a collaborator threw onto a BridgeError.
 * BridgeErrors pass through unchanged, also when a transport error
 * carries one as its cause.
 */
export function toBridgeError(err: unknown): BridgeError {
  if (err instanceof BridgeError) {
    return err;
  }
  if (err instanceof RegistryError) {
    return new BridgeError(REGISTRY_CODES[err.code] ?? "REGISTRY_FAILED", err.message, {
      cause: err,
    });
  }
  if (err instanceof TransportError) {
    // A role re-entered from a refund hook already said why it refused.
    if (err.cause instanceof BridgeError) return err.cause;
    return new BridgeError(TRANSPORT_CODES[err.code] ?? "TRANSPORT_FAILED", err.message, {
      cause: err,
    });
  }
  // Receiver callbacks throw through the registry unwrapped.
  const message = err instanceof Error ? err.message : String(err);
  return new BridgeError("REGISTRY_FAILED", `Collaborator failed: ${message}`, { cause: err });
}
