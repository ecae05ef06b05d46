/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests create the
 * app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { Address } from "@relaymint/types";
import type { NetworkConfigInput } from "@relaymint/bridge";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { BridgeService } from "./services/bridge-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { adminAuthMiddleware } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRoleRoutes } from "./routes/roles.js";
import { createTransportRoutes } from "./routes/transport.js";
import { createAuditRoutes } from "./routes/audit.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Deployment the node serves */
  readonly network: NetworkConfigInput;

  /** API key → administrator address. Without keys, admin routes answer 401. */
  readonly adminKeys?: ReadonlyMap<string, Address>;

  /** Request and role logger. Requests are not logged without one. */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BridgeService;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws {z.ZodError} if the network description is invalid
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new BridgeService({ network: options.network, logger: options.logger });
  const requireAdmin = adminAuthMiddleware(options.adminKeys ?? new Map());

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/roles", createRoleRoutes({ requireAdmin }));
  app.route("/api/v1/transport", createTransportRoutes({ requireAdmin }));
  app.route("/api/v1/audit", createAuditRoutes());

  return { app, service };
}
