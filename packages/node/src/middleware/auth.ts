/**
 * Administrator authentication middleware.
 *
 * Looks up the X-Api-Key header in the configured key registry. Each
 * key maps to an administrator address, which the route passes to the
 * role as the caller. Whether that address may administer the role is
 * the role's decision (NOT_ADMIN → 403).
 *
 * On success, sets `c.set("admin", address)`.
 * On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@relaymint/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

export function adminAuthMiddleware(
  apiKeys: ReadonlyMap<string, Address>,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const admin = apiKeys.get(apiKey);
    if (admin === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("admin", admin);
    return next();
  };
}
