/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import type { TransactionRecord } from "@concord/multisig";

// =============================================================================
// Shared Schemas
// =============================================================================

export const MoneySchema = z.object({
  amount: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

// =============================================================================
// Transaction DTOs
// =============================================================================

export const SubmitTransactionSchema = z.object({
  destination: z.string().min(1).max(256),
  amount: MoneySchema,
});

export type SubmitTransactionDto = z.infer<typeof SubmitTransactionSchema>;

export const ListTransactionsQuerySchema = z.object({
  status: z.enum(["pending", "executed"]).optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

export const ListNotificationsQuerySchema = z.object({
  txIndex: z.coerce.number().int().min(0).optional(),
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListNotificationsQuery = z.infer<typeof ListNotificationsQuerySchema>;

// =============================================================================
// Response Views
// =============================================================================

/**
 * A transaction as returned over HTTP: the record, its index, and the
 * owners currently confirming it.
 */
export interface TransactionView extends TransactionRecord {
  readonly index: number;
  readonly confirmedBy: readonly string[];
}
