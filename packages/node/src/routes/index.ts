/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createRoleRoutes } from "./roles.js";
export type { RoleRouteDeps } from "./roles.js";
export { createTransportRoutes } from "./transport.js";
export type { TransportRouteDeps } from "./transport.js";
export { createAuditRoutes } from "./audit.js";
