/**
 * Ledger Types
 *
 * Identity primitives shared by every ledger the bridge touches.
 *
 * Rules:
 * - Asset ids are the same value on every ledger
 * - Addresses are opaque; equality is exact string equality
 * - Amounts are native units of the ledger they are paid on
 */

/**
 * Ledger identifier (e.g., "origin", "dest-a").
 */
export type LedgerId = string;

/**
 * Opaque account or contract address on a ledger.
 */
export type Address = string;

/**
 * Unique asset identifier. Identity key across all ledgers.
 */
export type AssetId = bigint;

/**
 * The null address. Never a valid recipient.
 */
export const NULL_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
