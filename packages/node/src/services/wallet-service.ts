/**
 * WalletService: composes the Concord domain packages behind one facade.
 *
 * Wires together:
 * - InMemoryEnvironment (balances and the transfer capability)
 * - AuthorizationLedger (submit / confirm / revoke / execute)
 * - NotificationLog (hash-chained record of committed notifications)
 *
 * Route handlers call this service; it never touches HTTP.
 */

import type { Logger } from "pino";
import type { Money } from "@concord/types";
import { InMemoryEnvironment } from "@concord/environment";
import {
  AuthorizationLedger,
  MultisigError,
  NotificationLog,
} from "@concord/multisig";
import type {
  NotificationLogEntry,
  NotificationLogIntegrity,
  NotificationLogQuery,
  TransactionStatus,
} from "@concord/multisig";
import type { TransactionView } from "../types/dto.js";

// =============================================================================
// Config
// =============================================================================

export interface WalletServiceConfig {
  readonly owners: readonly string[];
  readonly walletAddress: string;
  readonly currency: string;
  readonly decimals: number;
  readonly initialBalance?: string | undefined;
}

export interface OwnerSet {
  readonly owners: readonly string[];
  readonly threshold: number;
}

// =============================================================================
// Service
// =============================================================================

export class WalletService {
  readonly environment: InMemoryEnvironment;
  readonly ledger: AuthorizationLedger;
  readonly notificationLog = new NotificationLog();

  private readonly log: Logger;

  constructor(config: WalletServiceConfig, logger: Logger) {
    this.log = logger.child({ component: "wallet" });

    this.environment = new InMemoryEnvironment({
      walletAddress: config.walletAddress,
      currency: config.currency,
      decimals: config.decimals,
      initialBalance: config.initialBalance,
    });
    this.ledger = new AuthorizationLedger(config.owners, this.environment, {
      onListenerError: (err, notification) => {
        this.log.error(
          { err, notification: notification.type, txIndex: notification.txIndex },
          "Notification listener failed",
        );
      },
    });
    this.notificationLog.attach(this.ledger);

    this.log.info(
      { owners: config.owners.length, currency: config.currency, balance: this.environment.balance().amount },
      "Wallet initialized",
    );
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  submit(caller: string, destination: string, amount: Money): TransactionView {
    const index = this.ledger.submit(caller, destination, amount);
    this.log.info({ owner: caller, txIndex: index, destination, amount: amount.amount }, "Transaction submitted");
    return this.view(index);
  }

  confirm(caller: string, txIndex: number): TransactionView {
    this.ledger.confirm(caller, txIndex);
    this.log.info({ owner: caller, txIndex }, "Transaction confirmed");
    return this.view(txIndex);
  }

  revoke(caller: string, txIndex: number): TransactionView {
    this.ledger.revoke(caller, txIndex);
    this.log.info({ owner: caller, txIndex }, "Confirmation revoked");
    return this.view(txIndex);
  }

  execute(caller: string, txIndex: number): TransactionView {
    try {
      this.ledger.execute(caller, txIndex);
    } catch (err) {
      if (err instanceof MultisigError && err.code === "TRANSFER_FAILED") {
        this.log.warn({ owner: caller, txIndex, reason: err.message }, "Transfer declined");
      }
      throw err;
    }
    this.log.info({ owner: caller, txIndex }, "Transaction executed");
    return this.view(txIndex);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  owners(): OwnerSet {
    return { owners: this.ledger.getOwners(), threshold: this.ledger.threshold };
  }

  balance(): Money {
    return this.environment.balance();
  }

  transactionCount(): number {
    return this.ledger.getTransactionCount();
  }

  getTransaction(txIndex: number): TransactionView {
    return this.view(txIndex);
  }

  listTransactions(status?: TransactionStatus): readonly TransactionView[] {
    return this.ledger
      .listTransactions(status)
      .map(({ index, transaction }) => ({
        ...transaction,
        index,
        confirmedBy: this.ledger.getConfirmations(index),
      }));
  }

  /**
   * Throws TX_NOT_FOUND for an unknown index, unlike the ledger's
   * isConfirmed, so the route can answer 404.
   */
  isConfirmed(txIndex: number, owner: string): boolean {
    this.ledger.getTransaction(txIndex);
    return this.ledger.isConfirmed(txIndex, owner);
  }

  notifications(query?: NotificationLogQuery): readonly NotificationLogEntry[] {
    return this.notificationLog.entries(query);
  }

  /**
   * Readiness: the notification chain must verify end to end.
   */
  checkIntegrity(): NotificationLogIntegrity {
    return this.notificationLog.verify();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private view(txIndex: number): TransactionView {
    return {
      ...this.ledger.getTransaction(txIndex),
      index: txIndex,
      confirmedBy: this.ledger.getConfirmations(txIndex),
    };
  }
}
