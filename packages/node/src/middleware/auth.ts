/**
 * Caller identity middleware.
 *
 * Secured mode (API keys configured): X-Api-Key is looked up in the key
 * registry and resolves to an owner identity. An unknown key is rejected
 * with 401; no key means an anonymous caller.
 *
 * Unsecured mode (development, tests): the X-Owner-Id header is taken
 * at face value.
 *
 * Mutating routes guard with `requireCaller()`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, CallerContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const OWNER_ID_HEADER = "X-Owner-Id";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

// =============================================================================
// Identity Middleware
// =============================================================================

/**
 * Resolve the caller. With `config`, only API keys are honored.
 */
export function identityMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let caller: CallerContext | undefined;

    if (config !== undefined) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey !== undefined) {
        const record = config.apiKeys.get(apiKey);
        if (record === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
        }
        caller = { type: "api-key", identity: record.ownerId };
      }
    } else {
      const ownerId = c.req.header(OWNER_ID_HEADER)?.trim();
      if (ownerId !== undefined && ownerId !== "") {
        caller = { type: "header", identity: ownerId };
      }
    }

    c.set("caller", caller);
    return next();
  };
}

// =============================================================================
// Guard
// =============================================================================

/** AppEnv extended with the authenticated caller's identity. */
export interface CallerEnv {
  Variables: AppEnv["Variables"] & { owner: string };
}

/**
 * Reject anonymous callers with 401, otherwise expose the identity as
 * `owner`. Must run after identityMiddleware.
 *
 * Whether the identity is an owner is the ledger's decision (NOT_OWNER).
 */
export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const caller = c.get("caller");
    if (caller === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Caller identity required for this operation"),
        401,
      );
    }
    c.set("owner", caller.identity);
    return next();
  };
}
