/**
 * @fiscus/node — HTTP surface for the period and ledger engine.
 *
 * Public API for embedding the app (tests, other hosts). main.ts is the
 * standalone server entry point.
 */

export { FiscusService } from "./services/fiscus-service.js";
export type { FiscusServiceConfig } from "./services/fiscus-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, DEFAULT_TENANT_ID } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
