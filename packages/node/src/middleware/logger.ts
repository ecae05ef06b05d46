/**
 * Structured request logging middleware.
 *
 * Logs one line per request through a pino logger with method, path,
 * status, duration and request id. Server errors log at `error`,
 * client errors at `warn`, everything else at `info`.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    };
    const msg = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) logger.error(entry, msg);
    else if (entry.status >= 400) logger.warn(entry, msg);
    else logger.info(entry, msg);
  };
}
