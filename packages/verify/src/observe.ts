/**
 * Observation of a local deployment.
 *
 * Reads every registry, lock table and escrow of a LocalNetwork, plus
 * the transport's pending set, into a plain NetworkObservation. Pending
 * payloads are decoded to learn which asset each message carries.
 */

import type { AssetId } from "@relaymint/types";
import type { LocalNetwork } from "@relaymint/bridge";
import { decodeMessage } from "@relaymint/transport";
import type { AssetHolding, LedgerObservation, NetworkObservation } from "./types.js";

function byAssetId(a: AssetId, b: AssetId): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Take a picture of the whole deployment.
 */
export function observeNetwork(network: LocalNetwork): NetworkObservation {
  const locked = new Set(network.origin.role.lockedAssets());

  const ledgers: LedgerObservation[] = network.ledgers.map((node) => {
    const holdings: AssetHolding[] = [...node.registry.allAssets()]
      .sort(byAssetId)
      .map((assetId) => ({
        assetId: assetId.toString(),
        owner: node.registry.ownerOf(assetId),
      }));

    const isOrigin = node.ledgerId === network.origin.ledgerId;
    const locks = isOrigin
      ? [...locked].sort(byAssetId).map((id) => id.toString())
      : [];

    return {
      ledgerId: node.ledgerId,
      role: node.role.kind,
      roleAddress: node.role.address,
      holdings,
      locks,
      escrow: node.role.policy.escrow.toJSON(),
    };
  });

  const inFlight = network.transport.pending().map((envelope) => ({
    messageId: envelope.messageId,
    sourceLedger: envelope.sourceLedger,
    destinationLedger: envelope.destinationLedger,
    assetId: decodeMessage(envelope.payload).assetId.toString(),
  }));

  return {
    originLedger: network.origin.ledgerId,
    ledgers,
    inFlight,
    observedAt: new Date().toISOString(),
  };
}
