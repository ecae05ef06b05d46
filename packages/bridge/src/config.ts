/**
 * @relaymint/bridge — Network configuration.
 *
 * Describes a deployment: one origin ledger with its custodian, one or
 * more destination ledgers with their issuers, fee classes and fees,
 * the delivery cost the transport charges and opening native balances.
 * Validated with Zod.
 */

import { z } from "zod";
import { NULL_ADDRESS } from "@relaymint/types";

// =============================================================================
// Schema
// =============================================================================

const LedgerIdSchema = z.string().trim().min(1);

const AddressSchema = z
  .string()
  .trim()
  .min(1)
  .refine((address) => address !== NULL_ADDRESS, "must not be the null address");

/**
 * Native units. Accepts bigint, safe integer number or decimal string.
 * Numbers past 2^53 - 1 have already lost precision; pass a string.
 */
export const AmountSchema = z
  .union([
    z.bigint(),
    z.number().int().safe("must be a safe integer; pass larger amounts as a decimal string"),
    z.string().regex(/^\d+$/, "must be a whole number"),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n, "must be non-negative");

export const NetworkConfigSchema = z
  .object({
    admin: AddressSchema,
    origin: z.object({
      ledgerId: LedgerIdSchema,
      custodian: AddressSchema,
      /** Address allowed to mint originals. Default: admin */
      minter: AddressSchema.optional(),
      /** Fee class issuers charge for bridging back to origin */
      feeClass: z.string().trim().min(1).default("origin"),
    }),
    destinations: z
      .array(
        z.object({
          ledgerId: LedgerIdSchema,
          issuer: AddressSchema,
          feeClass: z.string().trim().min(1),
        }),
      )
      .min(1),
    fees: z.record(z.string(), AmountSchema),
    deliveryCost: AmountSchema.default(0n),
    /** Opening native balances: ledger → address → amount */
    balances: z.record(z.string(), z.record(z.string(), AmountSchema)).default({}),
  })
  .superRefine((config, ctx) => {
    const ledgers = [config.origin.ledgerId, ...config.destinations.map((d) => d.ledgerId)];
    const seen = new Set<string>();
    for (const ledgerId of ledgers) {
      if (seen.has(ledgerId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["destinations"],
          message: `Ledger "${ledgerId}" appears more than once`,
        });
      }
      seen.add(ledgerId);
    }

    for (const [ledgerId, accounts] of Object.entries(config.balances)) {
      if (!seen.has(ledgerId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["balances", ledgerId],
          message: `Balances given for unknown ledger "${ledgerId}"`,
        });
      }
      if (Object.keys(accounts).includes(NULL_ADDRESS)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["balances", ledgerId],
          message: "The null address cannot hold a balance",
        });
      }
    }

    const classes = [config.origin.feeClass, ...config.destinations.map((d) => d.feeClass)];
    for (const feeClass of classes) {
      if (config.fees[feeClass] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fees"],
          message: `No fee configured for class "${feeClass}"`,
        });
      }
    }
  });

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type NetworkConfigInput = z.input<typeof NetworkConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate a network description.
 *
 * @throws {z.ZodError} if the description is invalid
 */
export function parseNetworkConfig(input: unknown): NetworkConfig {
  return NetworkConfigSchema.parse(input);
}
