/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@relaymint/types";
import type { BridgeService } from "../services/bridge-service.js";

/**
 * Hono environment type for the Relaymint node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The deployment this node serves */
    service: BridgeService;

    /** Administrator address the API key maps to (set by admin auth) */
    admin: Address;
  };
}
