/**
 * Tests for ledger snapshot and restore.
 */

import { describe, it, expect } from "vitest";
import { InMemoryEnvironment } from "@concord/environment";
import type { Money } from "@concord/types";
import { AuthorizationLedger } from "../src/ledger.js";
import { parseSnapshot } from "../src/snapshot.js";
import { MultisigError } from "../src/types.js";
import type { LedgerNotification, MultisigSnapshot, SnapshotTransaction } from "../src/types.js";

const OWNERS = ["alice", "bob", "carol", "dave"];

function eth(amount: string): Money {
  return { amount, currency: "ETH", decimals: 0 };
}

function createEnvironment(): InMemoryEnvironment {
  return new InMemoryEnvironment({
    walletAddress: "wallet",
    currency: "ETH",
    decimals: 0,
    initialBalance: "1000",
  });
}

function tx(overrides: Partial<SnapshotTransaction> = {}): SnapshotTransaction {
  return {
    proposer: "alice",
    destination: "bob",
    amount: eth("10"),
    executed: false,
    confirmations: 0,
    confirmedBy: [],
    ...overrides,
  };
}

function snapshotWith(transactions: SnapshotTransaction[]): MultisigSnapshot {
  return {
    version: 1,
    owners: OWNERS,
    threshold: 2,
    transactions,
    savedAt: "2026-01-01T00:00:00.000Z",
  };
}

function snapshotError(value: unknown): MultisigError {
  try {
    AuthorizationLedger.fromSnapshot(value, createEnvironment());
  } catch (err) {
    if (err instanceof MultisigError) return err;
    throw err;
  }
  throw new Error("expected fromSnapshot to throw");
}

describe("snapshot", () => {
  it("captures owners, threshold, records, and confirmers", () => {
    const ledger = new AuthorizationLedger(OWNERS, createEnvironment());
    ledger.submit("alice", "bob", eth("100"));
    ledger.submit("bob", "carol", eth("5"));
    ledger.confirm("dave", 1);
    ledger.confirm("carol", 1);

    const snapshot = ledger.snapshot();

    expect(snapshot.version).toBe(1);
    expect(snapshot.owners).toEqual(OWNERS);
    expect(snapshot.threshold).toBe(2);
    expect(snapshot.transactions).toEqual([
      tx({ destination: "bob", amount: eth("100") }),
      tx({
        proposer: "bob",
        destination: "carol",
        amount: eth("5"),
        confirmations: 2,
        confirmedBy: ["carol", "dave"],
      }),
    ]);
  });

  it("restores an equivalent ledger from JSON", () => {
    const original = new AuthorizationLedger(OWNERS, createEnvironment());
    original.submit("alice", "bob", eth("100"));
    original.confirm("bob", 0);
    original.confirm("carol", 0);
    original.execute("alice", 0);
    original.submit("carol", "dave", eth("7"));
    original.confirm("alice", 1);

    const json: unknown = JSON.parse(JSON.stringify(original.snapshot()));
    const restored = AuthorizationLedger.fromSnapshot(json, createEnvironment());

    expect(restored.getOwners()).toEqual(OWNERS);
    expect(restored.getTransactionCount()).toBe(2);
    expect(restored.getTransaction(0).executed).toBe(true);
    expect(restored.getConfirmations(0)).toEqual(["bob", "carol"]);
    expect(restored.isConfirmed(1, "alice")).toBe(true);
    expect(restored.snapshot().transactions).toEqual(original.snapshot().transactions);
  });

  it("continues operating after restore without replaying notifications", () => {
    const original = new AuthorizationLedger(OWNERS, createEnvironment());
    original.submit("alice", "bob", eth("100"));
    original.confirm("bob", 0);

    const env = createEnvironment();
    const restored = AuthorizationLedger.fromSnapshot(original.snapshot(), env);
    const seen: LedgerNotification[] = [];
    restored.subscribe((n) => seen.push(n));

    expect(() => restored.confirm("bob", 0)).toThrow(MultisigError);
    restored.confirm("carol", 0);
    restored.execute("dave", 0);

    expect(env.balance()).toEqual(eth("900"));
    expect(seen).toEqual([
      { type: "confirmed", owner: "carol", txIndex: 0 },
      { type: "executed", owner: "dave", txIndex: 0 },
    ]);
  });

  it("does not share state with the ledger it came from", () => {
    const original = new AuthorizationLedger(OWNERS, createEnvironment());
    original.submit("alice", "bob", eth("1"));
    const restored = AuthorizationLedger.fromSnapshot(original.snapshot(), createEnvironment());

    original.confirm("bob", 0);

    expect(restored.getConfirmationCount(0)).toBe(0);
  });
});

describe("fromSnapshot validation", () => {
  it("rejects values that are not snapshots", () => {
    expect(snapshotError(null).code).toBe("INVALID_SNAPSHOT");
    expect(snapshotError({}).code).toBe("INVALID_SNAPSHOT");
    expect(snapshotError({ ...snapshotWith([]), version: 2 }).code).toBe("INVALID_SNAPSHOT");
  });

  it("rejects a threshold other than 2", () => {
    expect(snapshotError({ ...snapshotWith([]), threshold: 3 }).code).toBe("INVALID_SNAPSHOT");
  });

  it("rejects too few owners", () => {
    const error = snapshotError({ ...snapshotWith([]), owners: ["a", "b", "c"] });
    expect(error.message).toBe("Invalid snapshot: owners: More than 3 owners are required, got 3");
  });

  it("rejects repeated owners", () => {
    const error = snapshotError({ ...snapshotWith([]), owners: ["a", "b", "c", "a"] });
    expect(error.message).toBe("Invalid snapshot: owners: Owners must be distinct");
  });

  it("rejects a blank owner identity", () => {
    const error = snapshotError({ ...snapshotWith([]), owners: ["alice", "bob", "carol", "  "] });
    expect(error.code).toBe("INVALID_SNAPSHOT");
    expect(error.message).toBe(
      "Invalid snapshot: owners.3: Owner identities must be non-empty strings",
    );
  });

  it("rejects a count that disagrees with the confirmers", () => {
    const error = snapshotError(snapshotWith([tx({ confirmations: 1 })]));
    expect(error.message).toBe(
      "Invalid snapshot: transactions.0.confirmations: Count 1 does not match 0 confirming owners",
    );
  });

  it("rejects an executed record below the threshold", () => {
    const error = snapshotError(
      snapshotWith([tx({ executed: true, confirmations: 1, confirmedBy: ["bob"] })]),
    );
    expect(error.message).toBe(
      "Invalid snapshot: transactions.0.executed: Executed with 1 of 2 required confirmations",
    );
  });

  it("rejects confirmers and proposers outside the owner set", () => {
    const error = snapshotError(
      snapshotWith([tx({ proposer: "eve", confirmations: 1, confirmedBy: ["mallory"] })]),
    );
    expect(error.message).toBe(
      "Invalid snapshot: transactions.0.proposer: Proposer 'eve' is not an owner; " +
        "transactions.0.confirmedBy: 'mallory' is not an owner",
    );
  });

  it("rejects an amount in another currency than the environment", () => {
    const error = snapshotError(
      snapshotWith([tx({ amount: { amount: "1", currency: "USDC", decimals: 6 } })]),
    );
    expect(error.message).toBe(
      "Invalid snapshot: transactions.0.amount: Amount must be in ETH with 0 decimals, got USDC with 6",
    );
    expect(error.cause).toBeInstanceOf(MultisigError);
  });

  it("rejects a negative amount", () => {
    const error = snapshotError(snapshotWith([tx({ amount: eth("-3") })]));
    expect(error.message).toBe(
      'Invalid snapshot: transactions.0.amount: Amount must not be negative, got "-3"',
    );
  });
});

describe("parseSnapshot", () => {
  it("returns the parsed snapshot when it is valid", () => {
    const snapshot = snapshotWith([tx({ confirmations: 1, confirmedBy: ["carol"] })]);
    expect(parseSnapshot(snapshot)).toEqual(snapshot);
  });

  it("labels root-level issues", () => {
    expect(() => parseSnapshot("not a snapshot")).toThrow(/^Invalid snapshot: \(root\): /);
  });
});
