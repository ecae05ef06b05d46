/**
 * Message Codec
 *
 * Encodes bridge messages as canonical JSON (RFC 8785) so identical
 * messages always produce identical bytes, and decodes them back with
 * schema validation at the boundary.
 *
 * Message ids are SHA-256 of the canonical envelope, which makes
 * them content-addressed: two sends never share an id because the
 * envelope carries a per-transport nonce.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Address, BridgeMessage, LedgerId } from "@relaymint/types";
import { TransportError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const WireMessageSchema = z.object({
  version: z.literal(1),
  assetId: z.string().regex(/^\d+$/, "assetId must be an unsigned decimal integer"),
  sender: z.string().min(1),
  recipient: z.string().min(1),
});

// =============================================================================
// Encode / Decode
// =============================================================================

/**
 * Encode a bridge message as canonical JSON.
 */
export function encodeMessage(message: BridgeMessage): string {
  return canonicalize({
    version: message.version,
    assetId: message.assetId.toString(),
    sender: message.sender,
    recipient: message.recipient,
  });
}

/**
 * Decode and validate a payload.
 *
 * @throws {TransportError} MALFORMED_PAYLOAD if the payload is not a valid message
 */
export function decodeMessage(payload: string): BridgeMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    throw new TransportError("MALFORMED_PAYLOAD", "Payload is not valid JSON");
  }

  const result = WireMessageSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new TransportError("MALFORMED_PAYLOAD", `Invalid bridge message: ${detail}`);
  }

  return {
    version: result.data.version,
    assetId: BigInt(result.data.assetId),
    sender: result.data.sender,
    recipient: result.data.recipient,
  };
}

// =============================================================================
// Message Ids
// =============================================================================

export interface MessageIdInput {
  readonly sourceLedger: LedgerId;
  readonly destinationLedger: LedgerId;
  readonly sender: Address;
  readonly nonce: number;
  readonly payload: string;
}

/**
 * Compute the content-addressed id of an envelope.
 */
export function computeMessageId(input: MessageIdInput): string {
  const content = canonicalize({
    sourceLedger: input.sourceLedger,
    destinationLedger: input.destinationLedger,
    sender: input.sender,
    nonce: input.nonce,
    payload: input.payload,
  });
  return createHash("sha256").update(content).digest("hex");
}
