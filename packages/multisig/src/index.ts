/**
 * @concord/multisig: Multi-owner transfer authorization.
 *
 * An append-only log of proposed transfers that a fixed owner set
 * confirms under a 2-confirmation threshold before execution.
 *
 * Provides:
 * - AuthorizationLedger: submit / confirm / revoke / execute + queries
 * - NotificationLog: hash-chained record of committed notifications
 * - Snapshot parsing for persistence and restore
 *
 * @packageDocumentation
 */

export { AuthorizationLedger } from "./ledger.js";

export {
  NotificationLog,
  computeEntryHash,
  verifyNotificationChain,
  GENESIS_HASH,
} from "./notification-log.js";
export type {
  NotificationLogEntry,
  NotificationLogQuery,
  NotificationLogIntegrity,
  ChainBreak,
} from "./notification-log.js";

export { parseSnapshot, MultisigSnapshotSchema } from "./snapshot.js";

export {
  MultisigError,
  CONFIRMATION_THRESHOLD,
  OWNER_COUNT_FLOOR,
} from "./types.js";
export type {
  MultisigErrorCode,
  TransactionRecord,
  TransactionStatus,
  TransactionEntry,
  LedgerNotification,
  NotificationType,
  TransactionSubmitted,
  TransactionConfirmed,
  ConfirmationRevoked,
  TransactionExecuted,
  NotificationListener,
  Subscription,
  LedgerOptions,
  SnapshotTransaction,
  MultisigSnapshot,
} from "./types.js";
