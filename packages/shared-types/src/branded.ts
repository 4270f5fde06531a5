/**
 * Branded types for critical identifiers.
 * Prevents accidental misuse of string values across different domains.
 */

declare const __brand: unique symbol;

/** A branded type — structurally a string but nominally distinct. */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Unique identifier for one speech request (correlation ID). */
export type RequestId = Brand<string, "RequestId">;

/** Speech adapter identifier. */
export type ProviderId = Brand<string, "ProviderId">;

// ── Constructors (runtime validation + branding) ──

/** Create a RequestId from a string. Format: `req_<time>_<random>` */
export function createRequestId(id?: string): RequestId {
  const value =
    id ?? `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  return value as RequestId;
}

const VALID_PROVIDERS = ["google", "azure", "elevenlabs", "fake"] as const;

/** Brand a validated provider ID string. */
export function createProviderId(id: string): ProviderId {
  if (!(VALID_PROVIDERS as readonly string[]).includes(id)) {
    throw new TypeError(
      `Invalid ProviderId: "${id}". Must be one of: ${VALID_PROVIDERS.join(", ")}`,
    );
  }
  return id as ProviderId;
}

/** Known provider IDs as branded constants. */
export const ProviderIds = {
  Google: "google" as ProviderId,
  Azure: "azure" as ProviderId,
  ElevenLabs: "elevenlabs" as ProviderId,
  Fake: "fake" as ProviderId,
} as const;
