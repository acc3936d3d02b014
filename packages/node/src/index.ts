/**
 * @consortium/node: HTTP surface for the multisig engine.
 */

export { MultisigService, toAction } from "./services/multisig-service.js";
export type {
  MultisigServiceConfig,
  ActionView,
  BoardView,
  PerformResult,
} from "./services/multisig-service.js";
export { loadConfig, parseAddressList, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
