/**
 * Tests for health routes.
 */

import { describe, it, expect } from "vitest";
import { as, createTestApp, jsonRequest, usdc } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });
});

describe("GET /ready", () => {
  it("reports ready with an intact notification chain", async () => {
    const { app } = createTestApp();
    await app.request(
      jsonRequest("/api/v1/transactions", "POST", { destination: "bob", amount: usdc("1") }, as("alice")),
    );

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      status: string;
      transactions: number;
      notifications: { count: number; chainValid: boolean; lastVerifiedPosition: number };
    };
    expect(body.status).toBe("ready");
    expect(body.transactions).toBe(1);
    expect(body.notifications).toEqual({ count: 1, chainValid: true, lastVerifiedPosition: 1 });
  });
});
