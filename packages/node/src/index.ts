/**
 * @stellar-compass/node: Public API.
 *
 * The server itself starts from main.ts.
 */

export { CompassService } from "./services/compass-service.js";
export type { CompassServiceConfig } from "./services/compass-service.js";
export { loadConfig, parseCorsOrigins, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
