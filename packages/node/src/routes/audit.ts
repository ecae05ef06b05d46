/**
 * Audit route.
 *
 * GET /api/v1/audit — Custody invariant audit plus the state hash
 *
 * Answers 200 whatever the verdict; a FAIL lists its violations.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createAuditRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").audit() });
  });

  return routes;
}
