/**
 * Role routes.
 *
 * GET  /api/v1/roles                              — Status of every role
 * GET  /api/v1/roles/:ledgerId                    — Status of one role
 * GET  /api/v1/roles/:ledgerId/assets/:assetId    — Custody of one asset
 * GET  /api/v1/roles/:ledgerId/quote              — Price a bridge-out
 * POST /api/v1/roles/:ledgerId/pause              — Pause (admin)
 * POST /api/v1/roles/:ledgerId/unpause            — Unpause (admin)
 * POST /api/v1/roles/:ledgerId/fees/withdraw      — Sweep the fee escrow (admin)
 */

import { Hono } from "hono";
import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AssetIdSchema, QuoteQuerySchema, WithdrawFeesSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseBody, parseQuery } from "../middleware/validate.js";

export interface RoleRouteDeps {
  /** Authenticates administrators on mutating routes */
  readonly requireAdmin: MiddlewareHandler<AppEnv>;
}

function unknownLedger(c: Context<AppEnv>, ledgerId: string): Response {
  return c.json(createErrorEnvelope("NOT_FOUND", `No role on ledger '${ledgerId}'`), 404);
}

export function createRoleRoutes(deps: RoleRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/roles
  routes.get("/", (c) => {
    return c.json({ data: c.get("service").roles() });
  });

  // GET /api/v1/roles/:ledgerId
  routes.get("/:ledgerId", (c) => {
    const ledgerId = c.req.param("ledgerId");
    const status = c.get("service").status(ledgerId);
    if (status === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: status });
  });

  // GET /api/v1/roles/:ledgerId/assets/:assetId
  routes.get("/:ledgerId/assets/:assetId", (c) => {
    const ledgerId = c.req.param("ledgerId");
    const assetId = AssetIdSchema.parse(c.req.param("assetId"));
    const asset = c.get("service").asset(ledgerId, assetId);
    if (asset === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: asset });
  });

  // GET /api/v1/roles/:ledgerId/quote?destination=&assetId=
  routes.get("/:ledgerId/quote", (c) => {
    const ledgerId = c.req.param("ledgerId");
    const query = parseQuery(c, QuoteQuerySchema);
    const quote = c.get("service").quote(ledgerId, query.destination, query.assetId);
    if (quote === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: quote });
  });

  // POST /api/v1/roles/:ledgerId/pause
  routes.post("/:ledgerId/pause", deps.requireAdmin, (c) => {
    const ledgerId = c.req.param("ledgerId");
    const status = c.get("service").pause(ledgerId, c.get("admin"));
    if (status === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: status });
  });

  // POST /api/v1/roles/:ledgerId/unpause
  routes.post("/:ledgerId/unpause", deps.requireAdmin, (c) => {
    const ledgerId = c.req.param("ledgerId");
    const status = c.get("service").unpause(ledgerId, c.get("admin"));
    if (status === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: status });
  });

  // POST /api/v1/roles/:ledgerId/fees/withdraw
  routes.post("/:ledgerId/fees/withdraw", deps.requireAdmin, async (c) => {
    const ledgerId = c.req.param("ledgerId");
    const body = await parseBody(c, WithdrawFeesSchema);
    const amount = c.get("service").withdrawFees(ledgerId, c.get("admin"), body.recipient);
    if (amount === undefined) return unknownLedger(c, ledgerId);
    return c.json({ data: { recipient: body.recipient, amount } });
  });

  return routes;
}
