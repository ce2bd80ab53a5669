/**
 * Runtime type guard tests for @concord/types
 */
import { describe, it, expect } from "vitest";
import { isMoney, isTransferOutcome } from "../src/guards.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "100.50", currency: "USDC", decimals: 6 })).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "1", currency: "BTC", decimals: 0 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isMoney(null)).toBe(false);
    expect(isMoney("100")).toBe(false);
    expect(isMoney(100)).toBe(false);
    expect(isMoney(undefined)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "USDC", decimals: 6 })).toBe(false);
  });

  it("rejects missing currency", () => {
    expect(isMoney({ amount: "100", decimals: 6 })).toBe(false);
  });

  it("rejects fractional or negative decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: 1.5 })).toBe(false);
    expect(isMoney({ amount: "1", currency: "X", decimals: -1 })).toBe(false);
  });
});

// =============================================================================
// Environment guards
// =============================================================================

describe("isTransferOutcome", () => {
  it("accepts a success", () => {
    expect(isTransferOutcome({ ok: true })).toBe(true);
  });

  it("accepts a decline with a reason", () => {
    expect(isTransferOutcome({ ok: false, reason: "insufficient balance" })).toBe(true);
  });

  it("rejects a decline without a reason", () => {
    expect(isTransferOutcome({ ok: false })).toBe(false);
  });

  it("rejects booleans and null", () => {
    expect(isTransferOutcome(true)).toBe(false);
    expect(isTransferOutcome(null)).toBe(false);
  });
});
