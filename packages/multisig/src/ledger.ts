/**
 * Authorization Ledger: multi-owner transfer approval.
 *
 * A fixed set of owners proposes outbound transfers and confirms them.
 * Once a transaction holds enough distinct confirmations, any owner may
 * execute it, which hands the transfer to the execution environment.
 *
 * Rules:
 * - The owner list is fixed at construction (more than 3, all distinct)
 * - The threshold is 2 confirmations, whatever the owner count
 * - New transactions start with zero confirmations; the proposer must
 *   confirm explicitly like any other owner
 * - Each owner holds at most one confirmation per transaction
 * - Executed transactions are terminal: no confirm, revoke or re-execute
 * - Every mutating call is all-or-nothing, including the transfer itself
 * - Notifications go out only after the outermost call commits
 *
 * The transaction log is append-only; an index is the position a
 * transaction was created at and never changes.
 */

import type { Currency, ExecutionEnvironment, Money, TransferOutcome } from "@concord/types";
import { isMoney, isTransferOutcome } from "@concord/types";
import { parseAmount } from "@concord/environment";
import { parseSnapshot } from "./snapshot.js";
import {
  CONFIRMATION_THRESHOLD,
  MultisigError,
  OWNER_COUNT_FLOOR,
} from "./types.js";
import type {
  LedgerNotification,
  LedgerOptions,
  MultisigSnapshot,
  NotificationListener,
  SnapshotTransaction,
  Subscription,
  TransactionEntry,
  TransactionRecord,
  TransactionStatus,
} from "./types.js";

/** Mutable state captured before a call and restored if it throws. */
interface LedgerState {
  readonly transactions: readonly TransactionRecord[];
  readonly confirmations: ReadonlyMap<number, ReadonlySet<string>>;
}

export class AuthorizationLedger {
  readonly threshold: number = CONFIRMATION_THRESHOLD;
  readonly currency: Currency;
  readonly decimals: number;

  private readonly _owners: readonly string[];
  private readonly _ownerSet: ReadonlySet<string>;
  private readonly _environment: ExecutionEnvironment;

  private _transactions: TransactionRecord[] = [];
  /** Confirmation matrix: txIndex → owners holding a confirmation */
  private _confirmations = new Map<number, ReadonlySet<string>>();

  private readonly _listeners = new Set<NotificationListener>();
  private _pending: LedgerNotification[] = [];
  private _depth = 0;
  private _flushing = false;
  private readonly _onListenerError: LedgerOptions["onListenerError"];

  /**
   * @throws MultisigError INVALID_OWNER_COUNT when 3 or fewer owners are given
   * @throws MultisigError DUPLICATE_OWNER when an identity repeats
   */
  constructor(
    owners: readonly string[],
    environment: ExecutionEnvironment,
    options: LedgerOptions = {},
  ) {
    assertOwners(owners);
    this._onListenerError = options.onListenerError;

    this._owners = [...owners];
    this._ownerSet = new Set(owners);
    this._environment = environment;

    const { currency, decimals } = environment.balance();
    this.currency = currency;
    this.decimals = decimals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a transfer. Returns the new transaction's index.
   */
  submit(caller: string, destination: string, amount: Money): number {
    return this.atomically(() => {
      this.requireOwner(caller);
      this.assertDestination(destination);
      this.assertAmount(amount);

      // Owned copy: the approved amount must not follow the caller's object.
      const money: Money = {
        amount: amount.amount,
        currency: amount.currency,
        decimals: amount.decimals,
      };

      const txIndex = this._transactions.length;
      this._transactions.push({
        proposer: caller,
        destination,
        amount: money,
        executed: false,
        confirmations: 0,
      });

      this.raise({
        type: "submitted",
        owner: caller,
        txIndex,
        amount: money,
        balance: this._environment.balance(),
      });
      return txIndex;
    });
  }

  /**
   * Record the caller's approval of a pending transaction.
   */
  confirm(caller: string, txIndex: number): TransactionRecord {
    return this.atomically(() => {
      const record = this.requireTransaction(txIndex);
      this.requireOwner(caller);

      if (this.isConfirmed(txIndex, caller)) {
        throw new MultisigError(
          "ALREADY_CONFIRMED",
          `Owner '${caller}' has already confirmed transaction ${txIndex}`,
        );
      }
      if (record.executed) {
        throw new MultisigError("ALREADY_EXECUTED", `Transaction ${txIndex} has already been executed`);
      }

      this.setConfirmed(txIndex, caller, true);
      const updated = this.replace(txIndex, {
        ...record,
        confirmations: record.confirmations + 1,
      });

      this.raise({ type: "confirmed", owner: caller, txIndex });
      return updated;
    });
  }

  /**
   * Withdraw the caller's outstanding confirmation.
   *
   * A caller who holds no confirmation, owner or not, gets NOT_CONFIRMED.
   */
  revoke(caller: string, txIndex: number): TransactionRecord {
    return this.atomically(() => {
      const record = this.requireTransaction(txIndex);

      if (record.executed) {
        throw new MultisigError("ALREADY_EXECUTED", `Transaction ${txIndex} has already been executed`);
      }
      if (!this.isConfirmed(txIndex, caller)) {
        throw new MultisigError(
          "NOT_CONFIRMED",
          `'${caller}' holds no confirmation on transaction ${txIndex}`,
        );
      }

      this.setConfirmed(txIndex, caller, false);
      const updated = this.replace(txIndex, {
        ...record,
        confirmations: record.confirmations - 1,
      });

      this.raise({ type: "revoked", owner: caller, txIndex });
      return updated;
    });
  }

  /**
   * Execute a sufficiently confirmed transaction through the environment.
   *
   * The record is marked executed before the transfer runs, so a re-entrant
   * execute from inside the transfer sees ALREADY_EXECUTED. A declined or
   * throwing transfer rolls the whole call back and throws TRANSFER_FAILED;
   * the caller may retry once the cause is fixed.
   */
  execute(caller: string, txIndex: number): TransactionRecord {
    return this.atomically(() => {
      this.requireOwner(caller);
      const record = this.requireTransaction(txIndex);

      if (record.executed) {
        throw new MultisigError("ALREADY_EXECUTED", `Transaction ${txIndex} has already been executed`);
      }
      if (record.confirmations < this.threshold) {
        throw new MultisigError(
          "INSUFFICIENT_CONFIRMATIONS",
          `Transaction ${txIndex} has ${record.confirmations} of ${this.threshold} required confirmations`,
        );
      }

      const executed = this.replace(txIndex, { ...record, executed: true });

      const outcome = this.invokeTransfer(txIndex, record);
      if (!outcome.ok) {
        throw new MultisigError(
          "TRANSFER_FAILED",
          `Transfer for transaction ${txIndex} was declined: ${outcome.reason}`,
        );
      }

      this.raise({ type: "executed", owner: caller, txIndex });
      return executed;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getOwners(): readonly string[] {
    return [...this._owners];
  }

  isOwner(identity: string): boolean {
    return this._ownerSet.has(identity);
  }

  getTransactionCount(): number {
    return this._transactions.length;
  }

  /**
   * @throws MultisigError TX_NOT_FOUND for any index outside the log
   */
  getTransaction(txIndex: number): TransactionRecord {
    return this.requireTransaction(txIndex);
  }

  /**
   * Whether `owner` holds a confirmation on `txIndex`. Never throws.
   */
  isConfirmed(txIndex: number, owner: string): boolean {
    return this._confirmations.get(txIndex)?.has(owner) ?? false;
  }

  /**
   * Owners currently confirming `txIndex`, in owner-list order.
   */
  getConfirmations(txIndex: number): readonly string[] {
    this.requireTransaction(txIndex);
    return this._owners.filter((owner) => this.isConfirmed(txIndex, owner));
  }

  getConfirmationCount(txIndex: number): number {
    return this.requireTransaction(txIndex).confirmations;
  }

  /**
   * List transactions in log order, optionally by status.
   */
  listTransactions(status?: TransactionStatus): readonly TransactionEntry[] {
    const all = this._transactions.map((transaction, index) => ({ index, transaction }));
    if (status === undefined) {
      return all;
    }
    const wantExecuted = status === "executed";
    return all.filter((entry) => entry.transaction.executed === wantExecuted);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Notifications
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Receive every notification committed after this call, in order.
   */
  subscribe(listener: NotificationListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): MultisigSnapshot {
    const transactions: SnapshotTransaction[] = this._transactions.map((record, index) => ({
      ...record,
      confirmedBy: this.getConfirmations(index),
    }));

    return {
      version: 1,
      owners: this.getOwners(),
      threshold: this.threshold,
      transactions,
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a ledger from a snapshot. No notifications are raised.
   *
   * @throws MultisigError INVALID_SNAPSHOT when the snapshot is malformed,
   *   breaks a ledger invariant, or uses another currency than `environment`
   */
  static fromSnapshot(
    snapshot: unknown,
    environment: ExecutionEnvironment,
    options: LedgerOptions = {},
  ): AuthorizationLedger {
    const parsed = parseSnapshot(snapshot);
    const ledger = new AuthorizationLedger(parsed.owners, environment, options);

    parsed.transactions.forEach((tx, index) => {
      try {
        ledger.assertAmount(tx.amount);
      } catch (err) {
        throw new MultisigError(
          "INVALID_SNAPSHOT",
          `Invalid snapshot: transactions.${index}.amount: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }

      ledger._transactions.push({
        proposer: tx.proposer,
        destination: tx.destination,
        amount: tx.amount,
        executed: tx.executed,
        confirmations: tx.confirmations,
      });
      ledger._confirmations.set(index, new Set(tx.confirmedBy));
    });

    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Atomicity
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `operation` as one unit. If it throws, state and the notifications
   * it raised are discarded. Nested calls (a transfer re-entering the
   * ledger) roll back with their outermost call.
   */
  private atomically<T>(operation: () => T): T {
    const saved = this.captureState();
    const pendingMark = this._pending.length;

    this._depth++;
    let result: T;
    try {
      result = operation();
    } catch (err) {
      this.restoreState(saved);
      this._pending.length = pendingMark;
      throw err;
    } finally {
      this._depth--;
    }

    if (this._depth === 0 && !this._flushing) {
      this.flush();
    }
    return result;
  }

  private captureState(): LedgerState {
    return {
      transactions: [...this._transactions],
      confirmations: new Map(this._confirmations),
    };
  }

  private restoreState(state: LedgerState): void {
    this._transactions = [...state.transactions];
    this._confirmations = new Map(state.confirmations);
  }

  private raise(notification: LedgerNotification): void {
    this._pending.push(notification);
  }

  /**
   * Deliver pending notifications in commit order. Operations a listener
   * runs during delivery only enqueue; this loop delivers them after the
   * notifications committed before them.
   */
  private flush(): void {
    const failures: unknown[] = [];

    this._flushing = true;
    try {
      let notification = this._pending.shift();
      while (notification !== undefined) {
        for (const listener of [...this._listeners]) {
          try {
            listener(notification);
          } catch (err) {
            if (this._onListenerError === undefined) {
              failures.push(err);
            } else {
              this._onListenerError(err, notification);
            }
          }
        }
        notification = this._pending.shift();
      }
    } finally {
      this._flushing = false;
    }

    if (failures.length > 0) {
      throw new AggregateError(
        failures,
        `${failures.length} notification listener(s) failed after the operation committed`,
      );
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private invokeTransfer(txIndex: number, record: TransactionRecord): TransferOutcome {
    let outcome: unknown;
    try {
      outcome = this._environment.transfer(record.destination, record.amount);
    } catch (err) {
      throw new MultisigError(
        "TRANSFER_FAILED",
        `Transfer for transaction ${txIndex} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!isTransferOutcome(outcome)) {
      throw new MultisigError(
        "TRANSFER_FAILED",
        `Transfer for transaction ${txIndex} returned no outcome`,
      );
    }
    return outcome;
  }

  private requireOwner(caller: string): void {
    if (!this._ownerSet.has(caller)) {
      throw new MultisigError("NOT_OWNER", `'${caller}' is not an owner`);
    }
  }

  private requireTransaction(txIndex: number): TransactionRecord {
    const record = Number.isInteger(txIndex) ? this._transactions[txIndex] : undefined;
    if (record === undefined) {
      throw new MultisigError("TX_NOT_FOUND", `Transaction ${String(txIndex)} not found`);
    }
    return record;
  }

  private replace(txIndex: number, record: TransactionRecord): TransactionRecord {
    this._transactions[txIndex] = record;
    return record;
  }

  private setConfirmed(txIndex: number, owner: string, confirmed: boolean): void {
    const owners = new Set(this._confirmations.get(txIndex));
    if (confirmed) {
      owners.add(owner);
    } else {
      owners.delete(owner);
    }
    this._confirmations.set(txIndex, owners);
  }

  private assertDestination(destination: string): void {
    if (typeof destination !== "string" || destination.trim() === "") {
      throw new MultisigError("INVALID_DESTINATION", "Destination must be a non-empty string");
    }
  }

  private assertAmount(amount: Money): void {
    if (!isMoney(amount)) {
      throw new MultisigError("INVALID_AMOUNT", "Amount must be a Money value");
    }
    if (amount.currency !== this.currency || amount.decimals !== this.decimals) {
      throw new MultisigError(
        "INVALID_AMOUNT",
        `Amount must be in ${this.currency} with ${this.decimals} decimals, got ${amount.currency} with ${amount.decimals}`,
      );
    }

    let scaled: bigint;
    try {
      scaled = parseAmount(amount.amount, amount.decimals);
    } catch (err) {
      throw new MultisigError(
        "INVALID_AMOUNT",
        err instanceof Error ? err.message : String(err),
        { cause: err },
      );
    }

    if (scaled < 0n) {
      throw new MultisigError("INVALID_AMOUNT", `Amount must not be negative, got "${amount.amount}"`);
    }
  }
}

// =============================================================================
// Construction checks
// =============================================================================

function assertOwners(owners: readonly string[]): void {
  if (owners.length <= OWNER_COUNT_FLOOR) {
    throw new MultisigError(
      "INVALID_OWNER_COUNT",
      `More than ${OWNER_COUNT_FLOOR} owners are required, got ${owners.length}`,
    );
  }

  const seen = new Set<string>();
  for (const owner of owners) {
    if (typeof owner !== "string" || owner.trim() === "") {
      throw new MultisigError("INVALID_OWNER", "Owner identities must be non-empty strings");
    }
    if (seen.has(owner)) {
      throw new MultisigError("DUPLICATE_OWNER", `Owner '${owner}' is listed more than once`);
    }
    seen.add(owner);
  }
}
