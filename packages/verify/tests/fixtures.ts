/**
 * A three-ledger deployment shared by the verify tests.
 */

import { createLocalNetwork } from "@relaymint/bridge";
import type { LocalNetwork, NetworkConfigInput } from "@relaymint/bridge";

export const ADMIN = "0xadmin";
export const CUSTODIAN = "0xcustodian";
export const ALICE = "0xalice";
export const BOB = "0xbob";

export const OPENING_BALANCE = 1_000_000n;

const OPENING = { [ALICE]: OPENING_BALANCE, [BOB]: OPENING_BALANCE };

export const CONFIG: NetworkConfigInput = {
  admin: ADMIN,
  origin: { ledgerId: "origin", custodian: CUSTODIAN },
  destinations: [
    { ledgerId: "dest-a", issuer: "0xissuer-a", feeClass: "standard" },
    { ledgerId: "dest-b", issuer: "0xissuer-b", feeClass: "premium" },
  ],
  fees: { origin: 5n, standard: 10n, premium: 25n },
  deliveryCost: 3n,
  balances: { origin: OPENING, "dest-a": OPENING, "dest-b": OPENING },
};

export function buildNetwork(holders: Record<string, string> = { "1": ALICE }): LocalNetwork {
  const network = createLocalNetwork(CONFIG);
  for (const [assetId, holder] of Object.entries(holders)) {
    network.origin.registry.mint(network.minter, holder, BigInt(assetId));
  }
  return network;
}
