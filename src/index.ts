/**
 * totpgate — library entry point.
 */
export * from "./core/index.js";
export * from "./infrastructure/index.js";
export * from "./application/services/index.js";
export { createApp, type AppContext, type AppOverrides } from "./main.js";
