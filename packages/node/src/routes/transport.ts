/**
 * Transport routes over the in-memory messaging transport.
 *
 * GET  /api/v1/transport/pending   — Messages sent but not yet delivered
 * POST /api/v1/transport/deliver   — Deliver one pending message (admin)
 *
 * A failed delivery is still a 200: the message stays pending and the
 * response carries the receiver's error code.
 */

import { Hono } from "hono";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DeliverSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseBody } from "../middleware/validate.js";

export interface TransportRouteDeps {
  readonly requireAdmin: MiddlewareHandler<AppEnv>;
}

export function createTransportRoutes(deps: TransportRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/pending", (c) => {
    return c.json({ data: c.get("service").pending() });
  });

  routes.post("/deliver", deps.requireAdmin, async (c) => {
    const body = await parseBody(c, DeliverSchema);
    const result = c.get("service").deliver(body.messageId);
    if (result === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", "No message is pending"), 404);
    }
    return c.json({ data: result });
  });

  return routes;
}
