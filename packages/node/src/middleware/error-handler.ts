/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger and environment error codes to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { EnvironmentError } from "@concord/environment";
import { MultisigError } from "@concord/multisig";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Authorization ledger
  NOT_OWNER: 403,
  TX_NOT_FOUND: 404,
  ALREADY_CONFIRMED: 409,
  NOT_CONFIRMED: 409,
  ALREADY_EXECUTED: 409,
  INSUFFICIENT_CONFIRMATIONS: 422,
  TRANSFER_FAILED: 422,
  INVALID_AMOUNT: 400,
  INVALID_DESTINATION: 400,
  INVALID_OWNER: 400,
  INVALID_OWNER_COUNT: 400,
  DUPLICATE_OWNER: 400,
  INVALID_SNAPSHOT: 400,

  // Execution environment
  INVALID_MONEY: 400,
  CURRENCY_MISMATCH: 400,
  INVALID_ADDRESS: 400,
};

function domainCode(err: Error): string | undefined {
  if (err instanceof MultisigError || err instanceof EnvironmentError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  if (code === undefined || status === undefined) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
