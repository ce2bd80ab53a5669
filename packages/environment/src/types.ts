/**
 * @concord/environment: Types for the in-memory execution environment.
 */

import type { Currency, Money } from "@concord/types";

// ─── Configuration ───────────────────────────────────────────────────────

export interface InMemoryEnvironmentConfig {
  /** Account that holds the wallet's funds */
  readonly walletAddress: string;
  readonly currency: Currency;
  readonly decimals: number;
  /** Opening wallet balance as a decimal string. Default: "0" */
  readonly initialBalance?: string | undefined;
}

// ─── Transfer History ────────────────────────────────────────────────────

/**
 * A completed transfer out of the wallet.
 */
export interface TransferRecord {
  readonly destination: string;
  readonly money: Money;
  /** Wallet balance once the transfer settled */
  readonly balanceAfter: Money;
  readonly transferredAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type EnvironmentErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "INVALID_ADDRESS";

/**
 * Structured error from the environment.
 * Thrown for malformed input only; declined transfers are returned as values.
 */
export class EnvironmentError extends Error {
  public readonly code: EnvironmentErrorCode;

  constructor(code: EnvironmentErrorCode, message: string) {
    super(message);
    this.name = "EnvironmentError";
    this.code = code;
  }
}
