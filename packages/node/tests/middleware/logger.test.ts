/**
 * Tests for the request logging middleware.
 */

import { describe, it, expect } from "vitest";
import { as, createTestApp, jsonRequest } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("emits one entry per request with the caller", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request(
      jsonRequest("/api/v1/transactions/3", "GET", undefined, { ...as("alice"), "X-Request-Id": "req-1" }),
    );

    expect(res.status).toBe(404);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/api/v1/transactions/3",
      status: 404,
      requestId: "req-1",
      caller: "alice",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("leaves the caller unset for anonymous requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health");

    expect(entries[0]?.caller).toBeUndefined();
  });
});
