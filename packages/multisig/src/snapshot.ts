/**
 * Snapshot validation.
 *
 * Snapshots cross a trust boundary (disk, network), so they are parsed
 * with Zod and checked against the ledger invariants before any state is
 * rebuilt from them.
 */

import { z } from "zod";
import { CONFIRMATION_THRESHOLD, MultisigError, OWNER_COUNT_FLOOR } from "./types.js";
import type { MultisigSnapshot } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const MoneySchema = z.object({
  amount: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(36),
});

const SnapshotTransactionSchema = z.object({
  proposer: z.string().min(1),
  destination: z.string().min(1),
  amount: MoneySchema,
  executed: z.boolean(),
  confirmations: z.number().int().min(0),
  confirmedBy: z.array(z.string().min(1)),
});

export const MultisigSnapshotSchema = z
  .object({
    version: z.literal(1),
    owners: z.array(
      z.string().refine((owner) => owner.trim() !== "", "Owner identities must be non-empty strings"),
    ),
    threshold: z.literal(CONFIRMATION_THRESHOLD),
    transactions: z.array(SnapshotTransactionSchema),
    savedAt: z.string(),
  })
  .superRefine((snapshot, ctx) => {
    if (snapshot.owners.length <= OWNER_COUNT_FLOOR) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["owners"],
        message: `More than ${OWNER_COUNT_FLOOR} owners are required, got ${snapshot.owners.length}`,
      });
    }

    const owners = new Set(snapshot.owners);
    if (owners.size !== snapshot.owners.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["owners"],
        message: "Owners must be distinct",
      });
    }

    snapshot.transactions.forEach((tx, index) => {
      const path = ["transactions", index];

      if (!owners.has(tx.proposer)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "proposer"],
          message: `Proposer '${tx.proposer}' is not an owner`,
        });
      }

      const confirmers = new Set(tx.confirmedBy);
      if (confirmers.size !== tx.confirmedBy.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "confirmedBy"],
          message: "An owner appears more than once",
        });
      }
      for (const confirmer of confirmers) {
        if (!owners.has(confirmer)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, "confirmedBy"],
            message: `'${confirmer}' is not an owner`,
          });
        }
      }

      if (tx.confirmations !== tx.confirmedBy.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "confirmations"],
          message: `Count ${tx.confirmations} does not match ${tx.confirmedBy.length} confirming owners`,
        });
      }

      if (tx.executed && tx.confirmations < CONFIRMATION_THRESHOLD) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "executed"],
          message: `Executed with ${tx.confirmations} of ${CONFIRMATION_THRESHOLD} required confirmations`,
        });
      }
    });
  });

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse and check an untrusted snapshot.
 *
 * @throws MultisigError INVALID_SNAPSHOT listing every issue found
 */
export function parseSnapshot(value: unknown): MultisigSnapshot {
  const result = MultisigSnapshotSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MultisigError("INVALID_SNAPSHOT", `Invalid snapshot: ${issues}`);
  }
  return result.data;
}
