/**
 * Multi-Owner Authorization Types
 *
 * Domain types for the authorization ledger: a fixed owner set jointly
 * approving outbound transfers under a confirmation threshold.
 *
 * Design:
 * - All types are readonly
 * - Transaction records are replaced on change, never mutated in place
 * - Notifications are a discriminated union on `type`
 */

import type { Money } from "@concord/types";

// =============================================================================
// Policy Constants
// =============================================================================

/** Distinct confirmations required before a transaction may execute. */
export const CONFIRMATION_THRESHOLD = 2;

/** The owner list must be strictly longer than this. */
export const OWNER_COUNT_FLOOR = 3;

// =============================================================================
// Transaction Record
// =============================================================================

/**
 * A proposed outbound transfer tracked from submission through execution.
 */
export interface TransactionRecord {
  /** Owner who submitted the transaction */
  readonly proposer: string;

  /** Recipient of the transfer */
  readonly destination: string;

  readonly amount: Money;

  /** Flips to true exactly once; terminal */
  readonly executed: boolean;

  /** Number of owners with an outstanding confirmation */
  readonly confirmations: number;
}

export type TransactionStatus = "pending" | "executed";

/**
 * A record paired with its stable position in the log.
 */
export interface TransactionEntry {
  readonly index: number;
  readonly transaction: TransactionRecord;
}

// =============================================================================
// Notifications
// =============================================================================

/**
 * Discriminated union of everything the ledger announces.
 * Delivered only after the operation that raised it commits.
 */
export type LedgerNotification =
  | TransactionSubmitted
  | TransactionConfirmed
  | ConfirmationRevoked
  | TransactionExecuted;

export type NotificationType = LedgerNotification["type"];

export interface TransactionSubmitted {
  readonly type: "submitted";
  readonly owner: string;
  readonly txIndex: number;
  readonly amount: Money;
  /** Wallet balance reported by the environment at submission */
  readonly balance: Money;
}

export interface TransactionConfirmed {
  readonly type: "confirmed";
  readonly owner: string;
  readonly txIndex: number;
}

export interface ConfirmationRevoked {
  readonly type: "revoked";
  readonly owner: string;
  readonly txIndex: number;
}

export interface TransactionExecuted {
  readonly type: "executed";
  readonly owner: string;
  readonly txIndex: number;
}

export type NotificationListener = (notification: LedgerNotification) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface LedgerOptions {
  /**
   * Receives each listener failure during delivery. Without it, failures
   * are collected and thrown as one AggregateError once delivery ends.
   */
  readonly onListenerError?:
    | ((error: unknown, notification: LedgerNotification) => void)
    | undefined;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface SnapshotTransaction extends TransactionRecord {
  /** Owners holding a confirmation, in owner-list order */
  readonly confirmedBy: readonly string[];
}

/**
 * Complete ledger state for persistence.
 */
export interface MultisigSnapshot {
  readonly version: 1;
  readonly owners: readonly string[];
  readonly threshold: number;
  readonly transactions: readonly SnapshotTransaction[];
  readonly savedAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type MultisigErrorCode =
  | "NOT_OWNER"
  | "TX_NOT_FOUND"
  | "ALREADY_CONFIRMED"
  | "NOT_CONFIRMED"
  | "ALREADY_EXECUTED"
  | "INSUFFICIENT_CONFIRMATIONS"
  | "TRANSFER_FAILED"
  | "INVALID_OWNER_COUNT"
  | "DUPLICATE_OWNER"
  | "INVALID_OWNER"
  | "INVALID_AMOUNT"
  | "INVALID_DESTINATION"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the authorization ledger.
 * A mutating operation that throws leaves the ledger exactly as it was.
 */
export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;

  constructor(code: MultisigErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MultisigError";
    this.code = code;
  }
}
