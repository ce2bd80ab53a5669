/**
 * Type barrel: re-exports all public types from @concord/node.
 */

// DTOs
export {
  MoneySchema,
  SubmitTransactionSchema,
  ListTransactionsQuerySchema,
  ListNotificationsQuerySchema,
} from "./dto.js";
export type {
  SubmitTransactionDto,
  ListTransactionsQuery,
  ListNotificationsQuery,
  TransactionView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { CallerContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
