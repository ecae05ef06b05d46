/**
 * Tests for role query routes.
 *
 * GET /api/v1/roles, /roles/:ledgerId, /roles/:ledgerId/assets/:assetId,
 * /roles/:ledgerId/quote
 */

import { describe, it, expect } from "vitest";
import { ALICE, createBridgedApp, createTestApp } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("GET /api/v1/roles", () => {
  it("lists every role, origin first", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { kind: string; ledgerId: string }[] };
    expect(body.data.map((r) => [r.kind, r.ledgerId])).toEqual([
      ["custodian", "origin"],
      ["issuer", "dest-a"],
      ["issuer", "dest-b"],
    ]);
  });

  it("returns one role with its locks and escrow", async () => {
    const { app } = createBridgedApp();
    const res = await app.request("/api/v1/roles/origin");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: {
        state: string;
        lockedAssets: string[];
        escrow: { balance: string };
        trustedRemotes: Record<string, string>;
      };
    };
    expect(body.data.state).toBe("active");
    expect(body.data.lockedAssets).toEqual(["1"]);
    expect(body.data.escrow.balance).toBe("10");
    expect(body.data.trustedRemotes).toEqual({ "dest-a": "0xissuer-a", "dest-b": "0xissuer-b" });
  });

  it("returns 404 for an unknown ledger", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/dest-z");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "NOT_FOUND", message: "No role on ledger 'dest-z'" });
  });
});

describe("GET /api/v1/roles/:ledgerId/assets/:assetId", () => {
  it("shows a locked original with its lock entry", async () => {
    const { app } = createBridgedApp();
    const res = await app.request("/api/v1/roles/origin/assets/1");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: { owner: string; custodied: boolean; lock: Record<string, string> | null };
    };
    expect(body.data).toMatchObject({
      ledgerId: "origin",
      assetId: "1",
      exists: true,
      owner: "0xcustodian",
      custodied: true,
    });
    expect(body.data.lock).toMatchObject({ originalHolder: ALICE, destination: "dest-a" });
    expect(body.data.lock?.["messageId"]).toMatch(/^[0-9a-f]{64}$/);
  });

  it("shows an asset that does not exist on the ledger yet", async () => {
    const { app } = createBridgedApp();
    const res = await app.request("/api/v1/roles/dest-a/assets/1");

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      ledgerId: "dest-a",
      assetId: "1",
      exists: false,
      owner: null,
      custodied: false,
      lock: null,
    });
  });

  it("rejects a non-numeric asset id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/origin/assets/abc");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/roles/:ledgerId/quote", () => {
  it("prices a bridge-out by destination class", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/origin/quote?destination=dest-b");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      destination: "dest-b",
      fee: "25",
      deliveryCost: "3",
      total: "28",
    });
  });

  it("prices the way back from an issuer", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/dest-a/quote?destination=origin&assetId=1");

    const body = (await res.json()) as { data: { total: string } };
    expect(body.data.total).toBe("8");
  });

  it("maps an unsupported destination to 404 with its kind", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/origin/quote?destination=dest-z");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNSUPPORTED_DESTINATION");
    expect(body.error.details).toEqual({ kind: "PolicyViolation" });
  });

  it("requires a destination", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/roles/origin/quote");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});
