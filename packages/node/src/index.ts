/**
 * @relaymint/node — HTTP surface over a Relaymint deployment.
 *
 * Importing this module starts nothing; `main.ts` is the executable.
 */

export { BridgeService } from "./services/bridge-service.js";
export type { AuditReport, BridgeServiceOptions } from "./services/bridge-service.js";
export { loadConfig, loadNetwork, parseAdminKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedAdminKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
