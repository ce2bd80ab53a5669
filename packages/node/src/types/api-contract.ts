/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { WalletService } from "../services/wallet-service.js";
import type { CallerContext } from "./auth.js";

/**
 * Hono environment type for the Concord app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The wallet served by this node */
    service: WalletService;

    /** Who is calling; undefined for anonymous reads (set by identity middleware) */
    caller: CallerContext | undefined;
  };
}
