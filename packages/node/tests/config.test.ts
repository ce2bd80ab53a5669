/**
 * Tests for config.ts: parseOwners, parseApiKeys, loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiKeys, parseOwners } from "../src/config.js";

// =============================================================================
// parseOwners
// =============================================================================

describe("parseOwners", () => {
  it("splits and trims a comma-separated list", () => {
    expect(parseOwners(" alice, bob ,carol,dave")).toEqual(["alice", "bob", "carol", "dave"]);
  });

  it("keeps duplicates for the ledger to reject", () => {
    expect(parseOwners("a,a")).toEqual(["a", "a"]);
  });

  it("throws when the list is empty", () => {
    expect(() => parseOwners("")).toThrow("WALLET_OWNERS is required");
    expect(() => parseOwners("   ")).toThrow("WALLET_OWNERS is required");
  });

  it("throws on an empty entry with its position", () => {
    expect(() => parseOwners("alice,,bob")).toThrow(
      "Empty owner identity at position 2 in WALLET_OWNERS",
    );
  });
});

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated key:owner entries", () => {
    expect(parseApiKeys("k1:alice, k2:bob ")).toEqual([
      { key: "k1", ownerId: "alice" },
      { key: "k2", ownerId: "bob" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or owner", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("Owner ID cannot be empty");
  });

  it("throws on a repeated key", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow('API key "k1" is listed more than once');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.WALLET_OWNERS).toBe("");
    expect(config.WALLET_ADDRESS).toBe("wallet");
    expect(config.WALLET_CURRENCY).toBe("USDC");
    expect(config.WALLET_DECIMALS).toBe(6);
    expect(config.WALLET_INITIAL_BALANCE).toBe("0");
    expect(config.API_KEYS).toBe("");
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ PORT: "8080", WALLET_DECIMALS: "2" });
    expect(config.PORT).toBe(8080);
    expect(config.WALLET_DECIMALS).toBe(2);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => loadConfig({ WALLET_INITIAL_BALANCE: "-5" })).toThrow();
  });
});
