/**
 * Runtime Type Guards
 *
 * Narrowing functions for Concord domain types, used at system
 * boundaries (API inputs, deserialized snapshots, host callbacks).
 */

import type { Money } from "./financial.js";
import type { TransferOutcome } from "./environment.js";

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isTransferOutcome(value: unknown): value is TransferOutcome {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.ok === true) return true;
  return v.ok === false && typeof v.reason === "string";
}
