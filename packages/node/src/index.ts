/**
 * @concord/node: HTTP surface for the authorization ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { WalletService } from "./services/wallet-service.js";
export type { WalletServiceConfig, OwnerSet } from "./services/wallet-service.js";
export { loadConfig, parseApiKeys, parseOwners, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
