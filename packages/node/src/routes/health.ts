/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (503 while any role is paused)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { BridgeService } from "../services/bridge-service.js";

export function createHealthRoutes(service: BridgeService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const roles: Record<string, string> = {};
    for (const status of service.roles()) {
      roles[status.ledgerId] = status.state;
    }
    const allActive = Object.values(roles).every((state) => state === "active");

    return c.json(
      {
        status: allActive ? "ready" : "degraded",
        roles,
        timestamp: new Date().toISOString(),
      },
      allActive ? 200 : 503,
    );
  });

  return routes;
}
