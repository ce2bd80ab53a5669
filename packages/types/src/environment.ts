/**
 * Execution Environment Contract
 *
 * The host that holds the wallet's value balance and moves funds.
 * The authorization ledger consumes it as a capability and never
 * reaches past this interface.
 *
 * Calls are synchronous: a transfer either completes or is declined
 * before control returns to the ledger.
 */

import type { Money } from "./financial.js";

export interface TransferSucceeded {
  readonly ok: true;
}

export interface TransferDeclined {
  readonly ok: false;
  /** Why the environment refused the transfer */
  readonly reason: string;
}

/**
 * Result of a transfer attempt. Declines are values, not exceptions.
 */
export type TransferOutcome = TransferSucceeded | TransferDeclined;

export interface ExecutionEnvironment {
  /** Current value balance held by the wallet. */
  balance(): Money;

  /** Move `amount` from the wallet to `destination`. */
  transfer(destination: string, amount: Money): TransferOutcome;
}
