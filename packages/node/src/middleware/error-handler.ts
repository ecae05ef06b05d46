/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * BridgeErrors map by code where one has its own status, otherwise
 * by kind:
 * - PolicyViolation → 422
 * - InvariantViolation → 409
 * - ExternalFailure → 502
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { BridgeError } from "@relaymint/bridge";
import type { BridgeErrorCode, BridgeErrorKind } from "@relaymint/bridge";
import { TransportError } from "@relaymint/transport";
import type { TransportErrorCode } from "@relaymint/transport";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";
import { InvalidJsonError } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const KIND_STATUS: Record<BridgeErrorKind, ErrorStatus> = {
  PolicyViolation: 422,
  InvariantViolation: 409,
  ExternalFailure: 502,
};

const CODE_STATUS: Partial<Record<BridgeErrorCode, ErrorStatus>> = {
  NOT_ADMIN: 403,
  UNAUTHORIZED_CALLER: 403,
  UNTRUSTED_SOURCE: 403,
  NULL_RECIPIENT: 400,
  INVALID_FEE: 400,
  INVALID_ROYALTY: 400,
  MALFORMED_MESSAGE: 400,
  UNSUPPORTED_DESTINATION: 404,
  NOT_HELD: 404,
  PAUSED: 409,
  INVALID_PAUSE_TRANSITION: 409,
  REENTRANT_CALL: 409,
};

const TRANSPORT_STATUS: Record<TransportErrorCode, ErrorStatus> = {
  UNKNOWN_DESTINATION: 404,
  UNKNOWN_MESSAGE: 404,
  NOT_DELIVERED: 409,
  ALREADY_CONNECTED: 409,
  INSUFFICIENT_BUDGET: 422,
  MALFORMED_PAYLOAD: 400,
  REFUND_FAILED: 502,
};

export function statusOf(err: Error): ErrorStatus {
  if (err instanceof BridgeError) {
    return CODE_STATUS[err.code] ?? KIND_STATUS[err.kind];
  }
  if (err instanceof TransportError) return TRANSPORT_STATUS[err.code];
  if (err instanceof ZodError || err instanceof InvalidJsonError) return 400;
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const status = statusOf(err);

  if (err instanceof BridgeError) {
    return c.json(createErrorEnvelope(err.code, err.message, { kind: err.kind }), status);
  }
  if (err instanceof TransportError) {
    return c.json(createErrorEnvelope(err.code, err.message), status);
  }
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      }),
      status,
    );
  }

  if (err instanceof InvalidJsonError) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), status);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), status);
}
