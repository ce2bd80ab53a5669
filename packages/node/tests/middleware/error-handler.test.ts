/**
 * Tests for the global error handler.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { EnvironmentError } from "@concord/environment";
import { MultisigError } from "@concord/multisig";
import type { MultisigErrorCode } from "@concord/multisig";
import { handleError } from "../../src/middleware/error-handler.js";

function appThrowing(error: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

async function statusFor(error: Error): Promise<number> {
  const res = await appThrowing(error).request("/boom");
  return res.status;
}

describe("handleError", () => {
  it.each<[MultisigErrorCode, number]>([
    ["NOT_OWNER", 403],
    ["TX_NOT_FOUND", 404],
    ["ALREADY_CONFIRMED", 409],
    ["NOT_CONFIRMED", 409],
    ["ALREADY_EXECUTED", 409],
    ["INSUFFICIENT_CONFIRMATIONS", 422],
    ["TRANSFER_FAILED", 422],
    ["INVALID_AMOUNT", 400],
    ["INVALID_DESTINATION", 400],
    ["INVALID_OWNER_COUNT", 400],
    ["DUPLICATE_OWNER", 400],
    ["INVALID_SNAPSHOT", 400],
  ])("maps %s to %i", async (code, status) => {
    expect(await statusFor(new MultisigError(code, "test"))).toBe(status);
  });

  it("passes the domain code and message through", async () => {
    const res = await appThrowing(new MultisigError("NOT_OWNER", "'eve' is not an owner")).request("/boom");

    expect(await res.json()).toEqual({
      error: { code: "NOT_OWNER", message: "'eve' is not an owner" },
    });
  });

  it("maps environment errors", async () => {
    expect(await statusFor(new EnvironmentError("CURRENCY_MISMATCH", "mismatch"))).toBe(400);
  });

  it("hides unknown errors behind a 500", async () => {
    const res = await appThrowing(new Error("connection reset by peer")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
