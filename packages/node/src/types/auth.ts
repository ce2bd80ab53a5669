/**
 * Caller identity types.
 *
 * Two ways to establish who is calling:
 * 1. API key via X-Api-Key header, mapped to an owner identity
 * 2. X-Owner-Id header, accepted only when no API keys are configured
 */

// =============================================================================
// Caller Context
// =============================================================================

/**
 * Resolved caller, set by the identity middleware.
 */
export interface CallerContext {
  readonly type: "api-key" | "header";
  readonly identity: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly ownerId: string;
}
