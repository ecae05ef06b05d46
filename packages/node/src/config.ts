/**
 * @relaymint/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The deployment comes from a JSON network description (NETWORK_CONFIG)
 * or, without one, from a default origin plus DESTINATIONS.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { NULL_ADDRESS } from "@relaymint/types";
import type { Address } from "@relaymint/types";
import { AmountSchema, parseNetworkConfig } from "@relaymint/bridge";
import type { NetworkConfigInput } from "@relaymint/bridge";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  ADMIN_KEYS: z.string().default(""),

  // Deployment
  NETWORK_CONFIG: z.string().optional(),
  ADMIN_ADDRESS: z.string().min(1).default("0xadmin"),
  ORIGIN_LEDGER: z.string().min(1).default("origin"),
  DESTINATIONS: z.string().default("dest-a,dest-b"),
  DELIVERY_COST: AmountSchema.default(0n),
  DEFAULT_FEE: AmountSchema.default(0n),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Admin Key Parsing
// =============================================================================

export interface ParsedAdminKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the ADMIN_KEYS env var into structured records.
 *
 * Format: "key1:address1,key2:address2"
 */
export function parseAdminKeys(raw: string): readonly ParsedAdminKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedAdminKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid ADMIN_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (address === "" || address === NULL_ADDRESS) {
      throw new Error(`Invalid administrator address for key "${key}"`);
    }
    if (keys.some((k) => k.key === key)) {
      throw new Error(`Duplicate API key "${key}" in ADMIN_KEYS`);
    }

    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Network
// =============================================================================

/**
 * The deployment described by the configuration.
 *
 * With NETWORK_CONFIG, reads and validates that JSON file. Otherwise
 * one custodian on ORIGIN_LEDGER and one issuer per entry of
 * DESTINATIONS, all in a single "standard" fee class at DEFAULT_FEE.
 *
 * @throws {z.ZodError} if the description is invalid
 */
export function loadNetwork(config: AppConfig): NetworkConfigInput {
  if (config.NETWORK_CONFIG !== undefined) {
    const raw: unknown = JSON.parse(readFileSync(config.NETWORK_CONFIG, "utf-8"));
    return parseNetworkConfig(raw);
  }

  const destinations = config.DESTINATIONS.split(",")
    .map((ledgerId) => ledgerId.trim())
    .filter((ledgerId) => ledgerId !== "")
    .map((ledgerId) => ({
      ledgerId,
      issuer: `0xissuer-${ledgerId}`,
      feeClass: "standard",
    }));

  return parseNetworkConfig({
    admin: config.ADMIN_ADDRESS,
    origin: { ledgerId: config.ORIGIN_LEDGER, custodian: "0xcustodian", feeClass: "standard" },
    destinations,
    fees: { standard: config.DEFAULT_FEE },
    deliveryCost: config.DELIVERY_COST,
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
