/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTransactionRoutes, parseIndex } from "./transactions.js";
export { createWalletRoutes } from "./wallet.js";
export { createNotificationRoutes } from "./notifications.js";
