/**
 * In-memory execution environment.
 *
 * Holds account balances for a single currency and settles transfers
 * out of the wallet account. Suitable for:
 * - Unit and integration tests
 * - Development and the HTTP node's default wiring
 *
 * Not a custody system: all state is lost on process exit.
 *
 * Rules:
 * - Transfers never overdraw the wallet
 * - A destination that refuses funds declines the transfer
 * - Declines are returned as values; only malformed input throws
 */

import type {
  Currency,
  ExecutionEnvironment,
  Money,
  TransferOutcome,
} from "@concord/types";
import {
  addMoney,
  assertSameCurrency,
  compareMoney,
  isNegative,
  subtractMoney,
  validateMoney,
  zeroMoney,
} from "./money-math.js";
import { EnvironmentError } from "./types.js";
import type { InMemoryEnvironmentConfig, TransferRecord } from "./types.js";

export class InMemoryEnvironment implements ExecutionEnvironment {
  readonly walletAddress: string;
  readonly currency: Currency;
  readonly decimals: number;

  private readonly _balances = new Map<string, Money>();
  private readonly _refusing = new Set<string>();
  private readonly _transfers: TransferRecord[] = [];

  constructor(config: InMemoryEnvironmentConfig) {
    if (config.walletAddress.trim() === "") {
      throw new EnvironmentError("INVALID_ADDRESS", "Wallet address must be a non-empty string");
    }

    this.walletAddress = config.walletAddress;
    this.currency = config.currency;
    this.decimals = config.decimals;

    this._balances.set(this.walletAddress, zeroMoney(this.currency, this.decimals));
    this.deposit(this.money(config.initialBalance ?? "0"));
  }

  // ─── Balances ───────────────────────────────────────────────────────

  /**
   * Credit the wallet. Returns the new wallet balance.
   */
  deposit(amount: Money): Money {
    this.assertSpendable(amount);
    return this.credit(this.walletAddress, amount);
  }

  balance(): Money {
    return this.balanceOf(this.walletAddress);
  }

  balanceOf(address: string): Money {
    return this._balances.get(address) ?? zeroMoney(this.currency, this.decimals);
  }

  // ─── Transfers ──────────────────────────────────────────────────────

  transfer(destination: string, amount: Money): TransferOutcome {
    if (destination.trim() === "") {
      throw new EnvironmentError("INVALID_ADDRESS", "Destination must be a non-empty string");
    }
    this.assertSpendable(amount);

    if (this._refusing.has(destination)) {
      return { ok: false, reason: `Destination '${destination}' refuses incoming funds` };
    }

    const available = this.balance();
    if (compareMoney(available, amount) < 0) {
      return {
        ok: false,
        reason: `Insufficient balance: ${available.amount} ${this.currency} available, ${amount.amount} requested`,
      };
    }

    this._balances.set(this.walletAddress, subtractMoney(available, amount));
    this.credit(destination, amount);

    this._transfers.push({
      destination,
      money: amount,
      balanceAfter: this.balance(),
      transferredAt: new Date().toISOString(),
    });

    return { ok: true };
  }

  /**
   * Make `address` decline every incoming transfer until accepted again.
   */
  refuseFunds(address: string): void {
    this._refusing.add(address);
  }

  acceptFunds(address: string): void {
    this._refusing.delete(address);
  }

  /**
   * Successful transfers, oldest first.
   */
  transfers(): readonly TransferRecord[] {
    return [...this._transfers];
  }

  /**
   * Build a Money value in this environment's currency.
   */
  money(amount: string): Money {
    return { amount, currency: this.currency, decimals: this.decimals };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private credit(address: string, amount: Money): Money {
    const next = addMoney(this.balanceOf(address), amount);
    this._balances.set(address, next);
    return next;
  }

  private assertSpendable(amount: Money): void {
    validateMoney(amount);
    assertSameCurrency(amount, zeroMoney(this.currency, this.decimals));
    if (isNegative(amount)) {
      throw new EnvironmentError("INVALID_AMOUNT", `Amount must not be negative, got "${amount.amount}"`);
    }
  }
}
