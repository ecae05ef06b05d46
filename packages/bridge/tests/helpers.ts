/**
 * Shared fixtures for bridge tests.
 *
 * A three-ledger network: "origin" with the custodian, "dest-a" and
 * "dest-b" with issuers. Fees: 10 to dest-a, 25 to dest-b, 5 back to
 * origin. Every delivery costs 3. ALICE and BOB open with 1000 on
 * every ledger.
 */

import type { AssetId, MessageDelivery } from "@relaymint/types";
import { encodeMessage } from "@relaymint/transport";
import { createLocalNetwork } from "../src/local-network.js";
import type { LocalNetwork } from "../src/local-network.js";
import type { NetworkConfigInput } from "../src/config.js";
import { BridgeError } from "../src/errors.js";
import type { BridgeErrorCode } from "../src/errors.js";

export const ADMIN = "0xadmin";
export const CUSTODIAN = "0xcustodian";
export const ISSUER_A = "0xissuer-a";
export const ISSUER_B = "0xissuer-b";
export const ALICE = "0xalice";
export const BOB = "0xbob";
export const TREASURY = "0xtreasury";

export const FEE_TO_A = 10n;
export const FEE_TO_B = 25n;
export const FEE_TO_ORIGIN = 5n;
export const DELIVERY_COST = 3n;
export const STARTING_BALANCE = 1_000n;

const OPENING = { [ALICE]: STARTING_BALANCE, [BOB]: STARTING_BALANCE };

export const CONFIG: NetworkConfigInput = {
  admin: ADMIN,
  origin: { ledgerId: "origin", custodian: CUSTODIAN },
  destinations: [
    { ledgerId: "dest-a", issuer: ISSUER_A, feeClass: "standard" },
    { ledgerId: "dest-b", issuer: ISSUER_B, feeClass: "premium" },
  ],
  fees: { origin: FEE_TO_ORIGIN, standard: FEE_TO_A, premium: FEE_TO_B },
  deliveryCost: DELIVERY_COST,
  balances: { origin: OPENING, "dest-a": OPENING, "dest-b": OPENING },
};

export function buildNetwork(): LocalNetwork {
  return createLocalNetwork(CONFIG);
}

/**
 * Mint an original on the origin ledger.
 */
export function mintOriginal(network: LocalNetwork, holder: string, assetId: AssetId): void {
  network.origin.registry.mint(network.minter, holder, assetId);
}

export function issuerNode(network: LocalNetwork, ledgerId: string) {
  const node = network.destinations.get(ledgerId);
  if (node === undefined) throw new Error(`No destination ${ledgerId}`);
  return node;
}

/**
 * Code of the BridgeError `fn` throws, or undefined if it returns.
 */
export function codeOf(fn: () => unknown): BridgeErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof BridgeError) return err.code;
    throw err;
  }
  return undefined;
}

/**
 * A delivery as the transport would hand it over.
 */
export function delivery(
  overrides: Partial<MessageDelivery> & { assetId?: AssetId; recipient?: string } = {},
): MessageDelivery {
  const { assetId = 1n, recipient = ALICE, ...rest } = overrides;
  return {
    messageId: "msg-test",
    sourceLedger: "dest-a",
    sender: ISSUER_A,
    payload: encodeMessage({ version: 1, assetId, sender: ALICE, recipient }),
    attempt: 1,
    ...rest,
  };
}
