/**
 * Financial Types
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit native unit)
 */

/**
 * Currency identifier (e.g. "ETH", "USDC", "XRP").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic happens on bigint (see @concord/environment).
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * ETH = 18 (wei), USDC = 6, XRP = 6 (drops).
   */
  readonly decimals: number;
}
