/**
 * Vendor failure classification shared by the HTTP adapters.
 */

import {
  ErrorCodes,
  GatewayError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  type UpstreamError,
} from "@speech-gateway/shared-types";

/** Statuses that mean the vendor refused the request itself. */
const REJECTED_STATUSES: ReadonlySet<number> = new Set([400, 404, 413, 415, 422]);

/**
 * Map a non-2xx vendor response to an UpstreamError.
 * `body` is kept as operator detail only.
 */
export function classifyHttpFailure(
  vendor: string,
  status: number,
  body: string,
): UpstreamError {
  const detail = `${vendor} HTTP ${status}: ${body.slice(0, 500)}`;

  if (status === 401 || status === 403) {
    return new UpstreamRejectedError(
      ErrorCodes.UPSTREAM_AUTH_REJECTED,
      "The speech service rejected the gateway credential.",
      { detail },
    );
  }
  if (status === 429) {
    return new UpstreamUnavailableError(
      ErrorCodes.UPSTREAM_RATE_LIMITED,
      "The speech service is rate limiting requests. Please try again shortly.",
      { detail },
    );
  }
  // 408 is the vendor giving up on us; worth another attempt.
  if (status === 408) {
    return new UpstreamUnavailableError(
      ErrorCodes.UPSTREAM_UNAVAILABLE,
      "The speech service is unavailable. Please try again.",
      { detail },
    );
  }
  if (REJECTED_STATUSES.has(status) || (status >= 400 && status < 500)) {
    return new UpstreamRejectedError(
      ErrorCodes.UPSTREAM_REJECTED,
      "The speech service rejected the request.",
      { detail },
    );
  }
  return new UpstreamUnavailableError(
    ErrorCodes.UPSTREAM_UNAVAILABLE,
    "The speech service is unavailable. Please try again.",
    { detail },
  );
}

/** Map a thrown fetch/parse failure to an UpstreamError; gateway errors pass through. */
export function classifyFetchFailure(vendor: string, err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return new UpstreamTimeoutError(
      ErrorCodes.UPSTREAM_TIMEOUT,
      "The speech service did not respond in time. Please try again.",
      { detail: `${vendor}: ${message}`, cause: err },
    );
  }
  return new UpstreamUnavailableError(
    ErrorCodes.UPSTREAM_UNAVAILABLE,
    "Could not reach the speech service.",
    { detail: `${vendor}: ${message}`, cause: err },
  );
}
