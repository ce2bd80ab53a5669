/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can drive the app in-process
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { pino } from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { WalletService } from "./services/wallet-service.js";
import type { WalletServiceConfig } from "./services/wallet-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { identityMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createNotificationRoutes } from "./routes/notifications.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly wallet: WalletServiceConfig;
  /** Domain logger. Default: silent */
  readonly logger?: Logger | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /**
   * API key configuration. When provided, callers are identified by
   * X-Api-Key only; otherwise the X-Owner-Id header is trusted.
   */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WalletService;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws MultisigError when the wallet's owner list is invalid
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new WalletService(options.wallet, logger);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", identityMiddleware(options.auth));

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createWalletRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/notifications", createNotificationRoutes());

  return { app, service };
}
