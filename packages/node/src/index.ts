/**
 * @cashout/node: HTTP API for vault cheque cashouts.
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
