/**
 * Notification Log: tamper-evident record of ledger notifications.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Editing any entry breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AuthorizationLedger } from "./ledger.js";
import type { LedgerNotification, Subscription } from "./types.js";

/** `previousHash` of the first entry. */
export const GENESIS_HASH = "genesis";

// =============================================================================
// Types
// =============================================================================

export interface NotificationLogEntry {
  /** 1-based position in the log */
  readonly position: number;
  readonly notification: LedgerNotification;
  readonly recordedAt: string;
  readonly hash: string;
  readonly previousHash: string;
}

export interface NotificationLogQuery {
  /** Only entries about this transaction */
  readonly txIndex?: number | undefined;
  /** Start from this position (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;
  readonly limit?: number | undefined;
}

export interface ChainBreak {
  readonly position: number;
  readonly reason: string;
}

export interface NotificationLogIntegrity {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly ChainBreak[];
}

// =============================================================================
// Hashing
// =============================================================================

/**
 * SHA-256 of an entry's canonical content followed by its predecessor's hash.
 */
export function computeEntryHash(
  entry: Pick<NotificationLogEntry, "position" | "notification" | "recordedAt">,
  previousHash: string,
): string {
  const content = canonicalize({
    position: entry.position,
    notification: entry.notification,
    recordedAt: entry.recordedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify a sequence of entries in position order.
 */
export function verifyNotificationChain(
  entries: readonly NotificationLogEntry[],
): NotificationLogIntegrity {
  const errors: ChainBreak[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const entry of entries) {
    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    previousHash = entry.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = entry.position;
    }
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}

// =============================================================================
// Log
// =============================================================================

export class NotificationLog {
  private readonly _entries: NotificationLogEntry[] = [];
  private _lastHash = GENESIS_HASH;

  /**
   * Record every notification the ledger commits from now on.
   */
  attach(ledger: AuthorizationLedger): Subscription {
    return ledger.subscribe((notification) => {
      this.append(notification);
    });
  }

  append(notification: LedgerNotification): NotificationLogEntry {
    const base = {
      position: this._entries.length + 1,
      notification,
      recordedAt: new Date().toISOString(),
    };
    const entry: NotificationLogEntry = {
      ...base,
      hash: computeEntryHash(base, this._lastHash),
      previousHash: this._lastHash,
    };

    this._lastHash = entry.hash;
    this._entries.push(entry);
    return entry;
  }

  entries(query?: NotificationLogQuery): readonly NotificationLogEntry[] {
    const fromPosition = query?.fromPosition ?? 1;
    const txIndex = query?.txIndex;

    let result = this._entries.filter(
      (e) =>
        e.position >= fromPosition &&
        (txIndex === undefined || e.notification.txIndex === txIndex),
    );

    const limit = query?.limit;
    if (limit !== undefined && limit >= 0) {
      result = result.slice(0, limit);
    }
    return result;
  }

  get size(): number {
    return this._entries.length;
  }

  verify(): NotificationLogIntegrity {
    return verifyNotificationChain(this._entries);
  }
}
