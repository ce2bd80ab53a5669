/**
 * @concord/environment: In-memory execution environment.
 *
 * Provides:
 * - InMemoryEnvironment: wallet balance + transfer capability
 * - Deterministic bigint money math shared across packages
 *
 * @packageDocumentation
 */

export { InMemoryEnvironment } from "./in-memory-environment.js";

export {
  parseAmount,
  formatAmount,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  isNegative,
  zeroMoney,
  compareMoney,
} from "./money-math.js";

export type {
  InMemoryEnvironmentConfig,
  TransferRecord,
  EnvironmentErrorCode,
} from "./types.js";
export { EnvironmentError } from "./types.js";
