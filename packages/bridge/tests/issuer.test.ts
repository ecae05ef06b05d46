/**
 * Tests for DestinationIssuer.
 *
 * Covers:
 * - Mint on credit, ALREADY_MINTED on duplicates, authentication
 * - Burn on debit, issuer-to-issuer hops, rollback
 * - Transfer validation and its bypass for bridge mint/burn
 * - Emergency recovery, royalties, status
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NULL_ADDRESS } from "@relaymint/types";
import type { InMemoryAssetRegistry } from "@relaymint/registry";
import type { LocalNetwork } from "../src/local-network.js";
import type { DestinationIssuer } from "../src/issuer.js";
import { AllowlistTransferValidator } from "../src/validators.js";
import type { TransferValidator } from "../src/validators.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CUSTODIAN,
  ISSUER_A,
  ISSUER_B,
  STARTING_BALANCE,
  buildNetwork,
  codeOf,
  delivery,
  issuerNode,
} from "./helpers.js";

const DENY_ALL: TransferValidator = {
  id: "deny-all",
  validateTransfer: () => false,
};

function fromOrigin(assetId = 1n, recipient = ALICE) {
  return delivery({ assetId, recipient, sourceLedger: "origin", sender: CUSTODIAN });
}

describe("DestinationIssuer", () => {
  let network: LocalNetwork;
  let issuer: DestinationIssuer;
  let registry: InMemoryAssetRegistry;

  beforeEach(() => {
    network = buildNetwork();
    const node = issuerNode(network, "dest-a");
    issuer = node.role;
    registry = node.registry;
  });

  // ─── Mint ──────────────────────────────────────────────────────────

  describe("receive", () => {
    it("mints the wrapped asset to the recipient", () => {
      issuer.receive(fromOrigin(1n, BOB));

      expect(registry.ownerOf(1n)).toBe(BOB);
      expect(issuer.isMinted(1n)).toBe(true);
      const [event] = issuer.policy.events.ofType("asset.minted");
      expect(event?.payload).toEqual({ assetId: "1", recipient: BOB, sourceLedger: "origin" });
      expect(event?.metadata.source).toBe("issuer");
    });

    it("refuses a second mint of a live asset", () => {
      issuer.receive(fromOrigin());
      expect(codeOf(() => issuer.receive(fromOrigin(1n, BOB)))).toBe("ALREADY_MINTED");
      expect(registry.ownerOf(1n)).toBe(ALICE);
      expect(issuer.policy.events.ofType("asset.minted")).toHaveLength(1);
    });

    it("accepts messages from every trusted counterpart and nobody else", () => {
      issuer.receive(delivery({ assetId: 7n, sourceLedger: "dest-b", sender: ISSUER_B }));
      expect(registry.ownerOf(7n)).toBe(ALICE);

      expect(
        codeOf(() => issuer.receive(delivery({ sourceLedger: "origin", sender: "0xmallory" }))),
      ).toBe("UNTRUSTED_SOURCE");
      expect(codeOf(() => issuer.receive(delivery({ sourceLedger: "dest-a", sender: ISSUER_A })))).toBe(
        "UNTRUSTED_SOURCE",
      );
    });

    it("refuses while paused", () => {
      issuer.pause(ADMIN);
      expect(codeOf(() => issuer.receive(fromOrigin()))).toBe("PAUSED");
      expect(issuer.isMinted(1n)).toBe(false);
    });

    it("refuses the null recipient", () => {
      expect(codeOf(() => issuer.receive(fromOrigin(1n, NULL_ADDRESS)))).toBe("NULL_RECIPIENT");
      expect(issuer.isMinted(1n)).toBe(false);
    });
  });

  // ─── Burn ──────────────────────────────────────────────────────────

  describe("bridgeOut", () => {
    beforeEach(() => {
      issuer.receive(fromOrigin());
    });

    it("burns the wrapped asset and escrows the fee", () => {
      const receipt = issuer.bridgeOut(ALICE, 1n, "origin", 8n);

      expect(issuer.isMinted(1n)).toBe(false);
      expect(issuer.policy.escrow.balance).toBe(5n);
      expect(issuerNode(network, "dest-a").balances.balanceOf(ALICE)).toBe(STARTING_BALANCE - 8n);
      expect(receipt).toMatchObject({
        assetId: 1n,
        destination: "origin",
        holder: ALICE,
        recipient: ALICE,
        fee: 5n,
        deliveryBudget: 3n,
        deliveryCost: 3n,
        refunded: 0n,
      });
      expect(issuer.policy.events.ofType("asset.burned")).toHaveLength(1);
      expect(issuer.policy.events.ofType("fee.collected")[0]?.payload).toEqual({
        amount: "5",
        destination: "origin",
      });
    });

    it("hops to another issuer at that destination's fee", () => {
      const receipt = issuer.bridgeOut(ALICE, 1n, "dest-b", 28n, { recipient: BOB });
      expect(receipt.fee).toBe(25n);

      network.transport.deliverNext();

      expect(issuerNode(network, "dest-b").registry.ownerOf(1n)).toBe(BOB);
      expect(issuer.isMinted(1n)).toBe(false);
    });

    it("rejects a caller that neither owns nor operates the asset", () => {
      expect(codeOf(() => issuer.bridgeOut(BOB, 1n, "origin", 8n))).toBe("UNAUTHORIZED_CALLER");
      expect(registry.ownerOf(1n)).toBe(ALICE);
    });

    it("re-creates the burned asset when a later step fails", () => {
      issuerNode(network, "dest-a").balances.block(ALICE);

      expect(codeOf(() => issuer.bridgeOut(ALICE, 1n, "origin", 20n))).toBe("TRANSPORT_FAILED");

      expect(registry.ownerOf(1n)).toBe(ALICE);
      expect(issuerNode(network, "dest-a").balances.balanceOf(ALICE)).toBe(STARTING_BALANCE);
      expect(issuer.policy.escrow.balance).toBe(0n);
      expect(issuer.policy.events.ofType("asset.burned")).toHaveLength(0);
      expect(network.transport.pending()).toHaveLength(0);
    });

    it("rejects a payment the holder cannot cover and keeps the asset", () => {
      expect(codeOf(() => issuer.bridgeOut(ALICE, 1n, "origin", STARTING_BALANCE + 1n))).toBe(
        "INSUFFICIENT_PAYMENT",
      );
      expect(registry.ownerOf(1n)).toBe(ALICE);
      expect(issuer.policy.escrow.balance).toBe(0n);
    });

    it("rejects an asset that is not minted here", () => {
      expect(codeOf(() => issuer.bridgeOut(ALICE, 2n, "origin", 8n))).toBe("NOT_HELD");
    });
  });

  // ─── Transfer Validation ───────────────────────────────────────────

  describe("transfer validation", () => {
    beforeEach(() => {
      issuer.receive(fromOrigin());
    });

    it("leaves ordinary transfers alone without a validator", () => {
      registry.transferCustody(ALICE, ALICE, BOB, 1n);
      expect(registry.ownerOf(1n)).toBe(BOB);
    });

    it("rejects a transfer the validator refuses", () => {
      issuer.setTransferValidator(ADMIN, new AllowlistTransferValidator("allowlist"));
      registry.approve(ALICE, BOB, 1n);

      expect(codeOf(() => registry.transferCustody(BOB, ALICE, BOB, 1n))).toBe("TRANSFER_REJECTED");
      expect(registry.ownerOf(1n)).toBe(ALICE);
    });

    it("allows holders and allowlisted operators", () => {
      const validator = new AllowlistTransferValidator("allowlist");
      issuer.setTransferValidator(ADMIN, validator);

      registry.transferCustody(ALICE, ALICE, BOB, 1n);
      expect(registry.ownerOf(1n)).toBe(BOB);

      validator.allow("0xmarket");
      registry.setApprovalForAll(BOB, "0xmarket", true);
      registry.transferCustody("0xmarket", BOB, ALICE, 1n);
      expect(registry.ownerOf(1n)).toBe(ALICE);
    });

    it("treats a throwing validator as a rejection", () => {
      issuer.setTransferValidator(ADMIN, {
        id: "broken",
        validateTransfer: () => {
          throw new Error("offline");
        },
      });

      expect(codeOf(() => registry.transferCustody(ALICE, ALICE, BOB, 1n))).toBe(
        "TRANSFER_REJECTED",
      );
    });

    it("never consults the validator for bridge burn and mint", () => {
      issuer.setTransferValidator(ADMIN, DENY_ALL);

      issuer.bridgeOut(ALICE, 1n, "origin", 8n);
      expect(issuer.isMinted(1n)).toBe(false);

      issuer.receive({ ...fromOrigin(2n), messageId: "msg-2" });
      expect(registry.ownerOf(2n)).toBe(ALICE);
    });

    it("consults the validator on emergency recovery", () => {
      registry.transferCustody(ALICE, ALICE, ISSUER_A, 1n);
      issuer.setTransferValidator(ADMIN, DENY_ALL);

      expect(codeOf(() => issuer.emergencyRecover(ADMIN, 1n, ALICE))).toBe("TRANSFER_REJECTED");
      expect(registry.ownerOf(1n)).toBe(ISSUER_A);
    });

    it("is set by the administrator only and can be cleared", () => {
      expect(codeOf(() => issuer.setTransferValidator(ALICE, DENY_ALL))).toBe("NOT_ADMIN");

      issuer.setTransferValidator(ADMIN, DENY_ALL);
      expect(issuer.transferValidator?.id).toBe("deny-all");
      issuer.setTransferValidator(ADMIN, undefined);
      expect(issuer.transferValidator).toBeUndefined();

      const payloads = issuer.policy.events.ofType("validator.updated").map((e) => e.payload);
      expect(payloads).toEqual([{ validator: "deny-all" }, { validator: null }]);
    });
  });

  // ─── Emergency Recovery ────────────────────────────────────────────

  describe("emergencyRecover", () => {
    beforeEach(() => {
      issuer.receive(fromOrigin());
    });

    it("releases a wrapped asset held by the issuer, even while paused", () => {
      registry.transferCustody(ALICE, ALICE, ISSUER_A, 1n);
      issuer.pause(ADMIN);

      issuer.emergencyRecover(ADMIN, 1n, BOB);

      expect(registry.ownerOf(1n)).toBe(BOB);
      expect(issuer.policy.events.ofType("emergency.recovered")[0]?.payload).toEqual({
        assetId: "1",
        recipient: BOB,
        wasLocked: false,
      });
    });

    it("requires the issuer to hold the asset", () => {
      expect(codeOf(() => issuer.emergencyRecover(ADMIN, 1n, BOB))).toBe("NOT_CUSTODIED");
      expect(codeOf(() => issuer.emergencyRecover(ADMIN, 42n, BOB))).toBe("NOT_CUSTODIED");
    });

    it("is administrator only", () => {
      registry.transferCustody(ALICE, ALICE, ISSUER_A, 1n);
      expect(codeOf(() => issuer.emergencyRecover(BOB, 1n, BOB))).toBe("NOT_ADMIN");
    });
  });

  // ─── Royalties ─────────────────────────────────────────────────────

  describe("royalties", () => {
    it("owes nothing until configured", () => {
      expect(issuer.royaltyInfo(1n, 10_000n)).toEqual({ receiver: NULL_ADDRESS, amount: 0n });
    });

    it("computes the royalty in basis points, rounded down", () => {
      issuer.setRoyaltyInfo(ADMIN, "0xartist", 250);

      expect(issuer.royaltyInfo(1n, 10_000n)).toEqual({ receiver: "0xartist", amount: 250n });
      expect(issuer.royaltyInfo(1n, 999n)).toEqual({ receiver: "0xartist", amount: 24n });
      expect(issuer.policy.events.ofType("royalty.updated")[0]?.payload).toEqual({
        receiver: "0xartist",
        feeBasisPoints: 250,
      });
    });

    it("rejects out-of-range or fractional basis points", () => {
      expect(codeOf(() => issuer.setRoyaltyInfo(ADMIN, "0xartist", 10_001))).toBe("INVALID_ROYALTY");
      expect(codeOf(() => issuer.setRoyaltyInfo(ADMIN, "0xartist", -1))).toBe("INVALID_ROYALTY");
      expect(codeOf(() => issuer.setRoyaltyInfo(ADMIN, "0xartist", 2.5))).toBe("INVALID_ROYALTY");
      expect(issuer.royaltyInfo(1n, 100n).amount).toBe(0n);
    });

    it("accepts the full range bounds", () => {
      issuer.setRoyaltyInfo(ADMIN, "0xartist", 10_000);
      expect(issuer.royaltyInfo(1n, 77n).amount).toBe(77n);
      issuer.setRoyaltyInfo(ADMIN, "0xartist", 0);
      expect(issuer.royaltyInfo(1n, 77n).amount).toBe(0n);
    });

    it("rejects a null receiver and non-admin callers", () => {
      expect(codeOf(() => issuer.setRoyaltyInfo(ADMIN, NULL_ADDRESS, 100))).toBe("NULL_RECIPIENT");
      expect(codeOf(() => issuer.setRoyaltyInfo(BOB, "0xartist", 100))).toBe("NOT_ADMIN");
    });
  });

  // ─── Status ────────────────────────────────────────────────────────

  it("reports status with validator and royalty", () => {
    issuer.setRoyaltyInfo(ADMIN, "0xartist", 500);
    issuer.setTransferValidator(ADMIN, DENY_ALL);

    expect(issuer.status()).toEqual({
      kind: "issuer",
      ledgerId: "dest-a",
      address: ISSUER_A,
      admin: ADMIN,
      state: "active",
      escrow: { balance: "0", totalCollected: "0", totalWithdrawn: "0" },
      feeSchedule: {
        classes: { origin: "origin", "dest-b": "premium" },
        fees: { origin: "5", standard: "10", premium: "25" },
      },
      trustedRemotes: { origin: CUSTODIAN, "dest-b": ISSUER_B },
      validator: "deny-all",
      royalty: { receiver: "0xartist", feeBasisPoints: 500 },
    });
  });
});
