/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 * GET /ready : Readiness probe (notification chain verifies end to end)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { WalletService } from "../services/wallet-service.js";

export function createHealthRoutes(service: WalletService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      transactions: service.transactionCount(),
      notifications: {
        count: service.notificationLog.size,
        chainValid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
      },
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
