/**
 * @concord/environment: bigint arithmetic over `Money`.
 *
 * A Money amount is a decimal string; here it becomes an integer count of
 * the currency's smallest unit (`units`), so no float ever touches a balance.
 */

import type { Money } from "@concord/types";
import { EnvironmentError } from "./types.js";

const AMOUNT_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * "100.50" at 2 decimals is 10050n; "-0.5" at 1 is -5n.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new EnvironmentError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const text = amount.trim();
  const match = AMOUNT_PATTERN.exec(text);
  if (match === null) {
    throw new EnvironmentError("INVALID_AMOUNT", `Invalid amount format: "${text}"`);
  }

  const [, sign = "", whole = "0", fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new EnvironmentError(
      "INVALID_AMOUNT",
      `Amount "${text}" has ${String(fraction.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const units = BigInt(whole + fraction.padEnd(decimals, "0"));
  return sign === "-" ? -units : units;
}

/** Inverse of parseAmount, always padded to `decimals` places. */
export function formatAmount(units: bigint, decimals: number): string {
  const sign = units < 0n ? "-" : "";
  const magnitude = units < 0n ? -units : units;
  if (decimals === 0) {
    return `${sign}${magnitude}`;
  }

  const scale = 10n ** BigInt(decimals);
  const fraction = (magnitude % scale).toString().padStart(decimals, "0");
  return `${sign}${magnitude / scale}.${fraction}`;
}

export function validateMoney(money: Money): void {
  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new EnvironmentError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new EnvironmentError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }
  parseAmount(money.amount, money.decimals);
}

export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new EnvironmentError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new EnvironmentError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

function units(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

function withUnits(like: Money, value: bigint): Money {
  return { amount: formatAmount(value, like.decimals), currency: like.currency, decimals: like.decimals };
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withUnits(a, units(a) + units(b));
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return withUnits(a, units(a) - units(b));
}

export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const diff = units(a) - units(b);
  return diff === 0n ? 0 : diff < 0n ? -1 : 1;
}

export function isNegative(money: Money): boolean {
  return units(money) < 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}
