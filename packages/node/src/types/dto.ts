/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Response views carry bigints as decimal strings.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** A non-negative integer asset id, written in decimal. */
export const AssetIdSchema = z
  .string()
  .regex(/^\d+$/, "Asset ids are non-negative decimal integers")
  .transform((value) => BigInt(value));

// =============================================================================
// Request DTOs
// =============================================================================

export const QuoteQuerySchema = z.object({
  destination: z.string().min(1),
  assetId: AssetIdSchema.default("0"),
});

export type QuoteQuery = z.infer<typeof QuoteQuerySchema>;

export const WithdrawFeesSchema = z.object({
  recipient: z.string().min(1),
});

export type WithdrawFeesDto = z.infer<typeof WithdrawFeesSchema>;

export const DeliverSchema = z.object({
  /** Pending message to deliver; the oldest when omitted */
  messageId: z.string().min(1).optional(),
});

export type DeliverDto = z.infer<typeof DeliverSchema>;

// =============================================================================
// Response Views
// =============================================================================

export interface QuoteView {
  readonly destination: string;
  readonly fee: string;
  readonly deliveryCost: string;
  readonly total: string;
}

export interface LockView {
  readonly originalHolder: string;
  readonly destination: string;
  readonly messageId: string;
  readonly lockedAt: string;
}

export interface AssetView {
  readonly ledgerId: string;
  readonly assetId: string;
  readonly exists: boolean;
  readonly owner: string | null;
  /** The role on this ledger holds the asset */
  readonly custodied: boolean;
  /** Origin only: the lock entry, if any */
  readonly lock: LockView | null;
}

export interface EnvelopeView {
  readonly messageId: string;
  readonly sourceLedger: string;
  readonly destinationLedger: string;
  readonly sender: string;
  readonly nonce: number;
  readonly deliveryCost: string;
}

export interface DeliveryView {
  readonly messageId: string;
  readonly status: "delivered" | "failed";
  readonly attempt: number;
  readonly error?: { readonly code: string; readonly message: string };
}
