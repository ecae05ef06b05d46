/**
 * Tests for the building blocks under BridgePolicy:
 * ReentrancyGuard, UndoJournal, FeeSchedule, FeeEscrow, toBridgeError.
 */

import { describe, it, expect } from "vitest";
import { RegistryError } from "@relaymint/registry";
import { TransportError } from "@relaymint/transport";
import { BridgeError, ERROR_KINDS, toBridgeError } from "../src/errors.js";
import { FeeEscrow } from "../src/fee-escrow.js";
import { FeeSchedule } from "../src/fee-schedule.js";
import { ReentrancyGuard } from "../src/guard.js";
import { UndoJournal } from "../src/journal.js";
import { codeOf } from "./helpers.js";

// =============================================================================
// ReentrancyGuard
// =============================================================================

describe("ReentrancyGuard", () => {
  it("returns the result and releases the flag", () => {
    const guard = new ReentrancyGuard();
    expect(guard.run("op", () => 42)).toBe(42);
    expect(guard.held).toBe(false);
  });

  it("rejects a nested run with REENTRANT_CALL", () => {
    const guard = new ReentrancyGuard();
    let inner: BridgeError | undefined;

    guard.run("outer", () => {
      expect(guard.current).toBe("outer");
      try {
        guard.run("inner", () => undefined);
      } catch (err) {
        if (err instanceof BridgeError) inner = err;
      }
    });

    expect(inner?.code).toBe("REENTRANT_CALL");
    expect(inner?.message).toBe('Cannot start "inner" while "outer" is in progress');
  });

  it("releases the flag when the operation throws", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run("op", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.held).toBe(false);
    expect(guard.run("next", () => "ok")).toBe("ok");
  });
});

// =============================================================================
// UndoJournal
// =============================================================================

describe("UndoJournal", () => {
  it("runs compensations newest first", () => {
    const journal = new UndoJournal();
    const order: number[] = [];
    journal.record(() => order.push(1));
    journal.record(() => order.push(2));
    journal.record(() => order.push(3));

    journal.rollback();

    expect(order).toEqual([3, 2, 1]);
    expect(journal.size).toBe(0);
  });

  it("runs every step and reports failures together", () => {
    const journal = new UndoJournal();
    const ran: string[] = [];
    journal.record(() => ran.push("first"));
    journal.record(() => {
      throw new Error("stuck");
    });
    journal.record(() => ran.push("last"));

    expect(codeOf(() => journal.rollback())).toBe("ROLLBACK_FAILED");
    expect(ran).toEqual(["last", "first"]);
  });
});

// =============================================================================
// FeeSchedule
// =============================================================================

describe("FeeSchedule", () => {
  it("resolves a destination through its class", () => {
    const schedule = new FeeSchedule({
      classes: { "dest-a": "l2", "dest-b": "l2" },
      fees: { l2: 7n },
    });
    expect(schedule.requiredFee("dest-a")).toBe(7n);
    expect(schedule.requiredFee("dest-b")).toBe(7n);
    expect(schedule.classOf("dest-a")).toBe("l2");
  });

  it("treats a destination without a class or fee as unsupported", () => {
    const schedule = new FeeSchedule({ classes: { "dest-a": "l2" } });
    expect(codeOf(() => schedule.requiredFee("dest-a"))).toBe("UNSUPPORTED_DESTINATION");
    expect(codeOf(() => schedule.requiredFee("dest-z"))).toBe("UNSUPPORTED_DESTINATION");
  });

  it("rejects empty class names", () => {
    const schedule = new FeeSchedule();
    expect(codeOf(() => schedule.update({ classes: { "dest-a": " " } }))).toBe("INVALID_FEE");
  });

  it("restores a previous view", () => {
    const schedule = new FeeSchedule({ classes: { "dest-a": "l2" }, fees: { l2: 7n } });
    const before = schedule.toJSON();
    schedule.update({ classes: { "dest-b": "l1" }, fees: { l1: 9n, l2: 8n } });

    schedule.restore(before);

    expect(schedule.toJSON()).toEqual({ classes: { "dest-a": "l2" }, fees: { l2: "7" } });
  });
});

// =============================================================================
// FeeEscrow
// =============================================================================

describe("FeeEscrow", () => {
  it("accrues, sweeps and undoes both", () => {
    const escrow = new FeeEscrow();
    const journal = new UndoJournal();

    escrow.accrue(10n, journal);
    escrow.accrue(0n, journal);
    expect(escrow.balance).toBe(10n);
    expect(journal.size).toBe(1);

    expect(escrow.sweep(journal)).toBe(10n);
    expect(escrow.toJSON()).toEqual({ balance: "0", totalCollected: "10", totalWithdrawn: "10" });

    journal.rollback();
    expect(escrow.toJSON()).toEqual({ balance: "0", totalCollected: "0", totalWithdrawn: "0" });
  });
});

// =============================================================================
// Error translation
// =============================================================================

describe("toBridgeError", () => {
  it("assigns the kind from the code", () => {
    expect(new BridgeError("NOT_LOCKED", "x").kind).toBe("InvariantViolation");
    expect(new BridgeError("PAUSED", "x").kind).toBe("PolicyViolation");
    expect(ERROR_KINDS.TRANSPORT_FAILED).toBe("ExternalFailure");
  });

  it("passes BridgeErrors through", () => {
    const err = new BridgeError("PAUSED", "paused");
    expect(toBridgeError(err)).toBe(err);
  });

  it("maps registry and transport codes and keeps the cause", () => {
    const registry = new RegistryError("ASSET_EXISTS", "exists");
    const mapped = toBridgeError(registry);
    expect(mapped.code).toBe("ALREADY_MINTED");
    expect(mapped.cause).toBe(registry);

    expect(toBridgeError(new RegistryError("NOT_AUTHORIZED", "no")).code).toBe("UNAUTHORIZED_CALLER");
    expect(toBridgeError(new RegistryError("RECIPIENT_REJECTED", "no")).code).toBe("REGISTRY_FAILED");
    expect(toBridgeError(new TransportError("INSUFFICIENT_BUDGET", "no")).code).toBe(
      "INSUFFICIENT_PAYMENT",
    );
    expect(toBridgeError(new TransportError("UNKNOWN_MESSAGE", "no")).code).toBe("TRANSPORT_FAILED");
    expect(toBridgeError(new TransportError("REFUND_FAILED", "no")).code).toBe("TRANSPORT_FAILED");
    expect(toBridgeError(new RegistryError("INSUFFICIENT_BALANCE", "no")).code).toBe(
      "INSUFFICIENT_PAYMENT",
    );
  });

  it("passes through a BridgeError carried by a transport error", () => {
    const inner = new BridgeError("REENTRANT_CALL", "busy");
    expect(toBridgeError(new TransportError("REFUND_FAILED", "no", { cause: inner }))).toBe(inner);
  });

  it("wraps anything else as an external failure", () => {
    const mapped = toBridgeError(new Error("disk full"));
    expect(mapped.code).toBe("REGISTRY_FAILED");
    expect(mapped.message).toBe("Collaborator failed: disk full");
  });
});
