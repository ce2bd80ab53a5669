/**
 * Wallet routes.
 *
 * GET /api/v1/owners  : Owner list and confirmation threshold
 * GET /api/v1/balance : Wallet balance from the execution environment
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/owners", (c) => {
    return c.json({ data: c.get("service").owners() });
  });

  routes.get("/balance", (c) => {
    return c.json({ data: c.get("service").balance() });
  });

  return routes;
}
