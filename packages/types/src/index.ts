/**
 * @concord/types: Shared domain types for the Concord stack.
 *
 * These types are used across all Concord packages:
 * - Financial primitives (Money, Currency)
 * - The execution environment capability consumed by the ledger
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type { Money, Currency } from "./financial.js";

// Execution environment contract
export type {
  ExecutionEnvironment,
  TransferOutcome,
  TransferSucceeded,
  TransferDeclined,
} from "./environment.js";

// Runtime type guards
export { isMoney, isTransferOutcome } from "./guards.js";
