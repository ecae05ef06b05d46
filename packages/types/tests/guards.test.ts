/**
 * Runtime type guard tests for @relaymint/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isNullAddress,
  isLedgerId,
  isAssetId,
  isBridgeMessage,
  isMessageDelivery,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { NULL_ADDRESS } from "../src/ledger.js";

// =============================================================================
// Identity guards
// =============================================================================

describe("isAddress", () => {
  it("accepts a non-empty string", () => {
    expect(isAddress("0xabc")).toBe(true);
  });

  it("rejects empty and whitespace strings", () => {
    expect(isAddress("")).toBe(false);
    expect(isAddress("   ")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isNullAddress", () => {
  it("recognizes the null address", () => {
    expect(isNullAddress(NULL_ADDRESS)).toBe(true);
    expect(isNullAddress("0xabc")).toBe(false);
  });
});

describe("isLedgerId", () => {
  it("accepts non-empty strings only", () => {
    expect(isLedgerId("origin")).toBe(true);
    expect(isLedgerId("")).toBe(false);
    expect(isLedgerId(1)).toBe(false);
  });
});

describe("isAssetId", () => {
  it("accepts non-negative bigints", () => {
    expect(isAssetId(0n)).toBe(true);
    expect(isAssetId(7n)).toBe(true);
  });

  it("rejects negative bigints and numbers", () => {
    expect(isAssetId(-1n)).toBe(false);
    expect(isAssetId(7)).toBe(false);
  });
});

// =============================================================================
// Message guards
// =============================================================================

describe("isBridgeMessage", () => {
  it("accepts a valid message", () => {
    expect(
      isBridgeMessage({ version: 1, assetId: 1n, sender: "0xa", recipient: "0xb" }),
    ).toBe(true);
  });

  it("rejects an unknown version", () => {
    expect(
      isBridgeMessage({ version: 2, assetId: 1n, sender: "0xa", recipient: "0xb" }),
    ).toBe(false);
  });

  it("rejects a string asset id", () => {
    expect(
      isBridgeMessage({ version: 1, assetId: "1", sender: "0xa", recipient: "0xb" }),
    ).toBe(false);
  });

  it("rejects null", () => {
    expect(isBridgeMessage(null)).toBe(false);
  });
});

describe("isMessageDelivery", () => {
  const valid = {
    messageId: "m1",
    sourceLedger: "origin",
    sender: "0xcustodian",
    payload: "{}",
    attempt: 1,
  };

  it("accepts a valid delivery", () => {
    expect(isMessageDelivery(valid)).toBe(true);
  });

  it("rejects attempt zero", () => {
    expect(isMessageDelivery({ ...valid, attempt: 0 })).toBe(false);
  });

  it("rejects a missing payload", () => {
    const { payload: _payload, ...rest } = valid;
    expect(isMessageDelivery(rest)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata / isDomainEvent", () => {
  const metadata = {
    eventId: "e1",
    timestamp: "2024-01-15T10:00:00.000Z",
    actor: "0xalice",
    correlationId: "m1",
    ledgerId: "origin",
    source: "custodian",
  };

  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "asset.locked", metadata, payload: { assetId: "1" } }),
    ).toBe(true);
  });

  it("rejects an event with null payload", () => {
    expect(isDomainEvent({ type: "asset.locked", metadata, payload: null })).toBe(false);
  });
});
