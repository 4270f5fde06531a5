/**
 * Error taxonomy for the speech gateway.
 *
 * Every error carries a stable `kind` (what class of failure it is, and so
 * which HTTP status it maps to) and a finer-grained `code`. The `message` is
 * safe to return to callers. The optional `detail` is for operators only:
 * it appears in logs, never in a response body.
 */

export type ErrorKind =
  | "config"
  | "credential"
  | "validation"
  | "upstream_unavailable"
  | "upstream_rejected"
  | "upstream_timeout"
  | "cancelled"
  | "internal";

export interface GatewayErrorOptions extends ErrorOptions {
  /** Operator-facing detail. Logged, never returned to the caller. */
  readonly detail?: string | undefined;
}

/** Public error body returned by the HTTP surface. */
export interface ErrorResponseBody {
  readonly error: string;
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly requestId?: string | undefined;
}

/** Base class for all gateway errors. */
export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  readonly code: ErrorCode;
  readonly detail: string | undefined;
  readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options?: GatewayErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.detail = options?.detail;
    this.timestamp = new Date().toISOString();
  }

  /** Structured representation for logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      ...(this.detail !== undefined ? { detail: this.detail } : {}),
      ...(this.cause != null ? { cause: String(this.cause) } : {}),
    };
  }

  /** Body safe to send to the caller: no detail, no cause. */
  toResponseBody(requestId?: string): ErrorResponseBody {
    return {
      error: this.message,
      code: this.code,
      kind: this.kind,
      ...(requestId !== undefined ? { requestId } : {}),
    };
  }
}

/** Invalid or missing startup configuration. The process must not serve traffic. */
export class ConfigError extends GatewayError {
  readonly kind = "config" as const;
}

/** Credential material is missing, malformed, or was refused by the vendor. */
export class CredentialError extends GatewayError {
  readonly kind = "credential" as const;
}

/** Defect in the caller's input. Never retried automatically. */
export class ValidationError extends GatewayError {
  readonly kind = "validation" as const;
}

export type UpstreamErrorKind = Extract<ErrorKind, `upstream_${string}`>;

/** Failure caused by the external speech vendor. */
export abstract class UpstreamError extends GatewayError {
  abstract override readonly kind: UpstreamErrorKind;

  /** Whether a higher-level policy may reasonably retry the call. */
  get retryable(): boolean {
    return this.kind !== "upstream_rejected";
  }
}

/** Vendor unreachable, overloaded, or answering with a server error. */
export class UpstreamUnavailableError extends UpstreamError {
  readonly kind = "upstream_unavailable" as const;
}

/** Vendor refused the request (bad input, auth, unsupported audio). */
export class UpstreamRejectedError extends UpstreamError {
  readonly kind = "upstream_rejected" as const;
}

/** Vendor did not answer within the configured bound. */
export class UpstreamTimeoutError extends UpstreamError {
  readonly kind = "upstream_timeout" as const;
}

/** The caller went away before the request completed. */
export class RequestCancelledError extends GatewayError {
  readonly kind = "cancelled" as const;
}

/** Anything else. Message is generic; the real cause goes into detail. */
export class InternalError extends GatewayError {
  readonly kind = "internal" as const;
}

// ── Error codes ──

export const ErrorCodes = {
  // Input
  INVALID_JSON: "INVALID_JSON",
  INVALID_AUDIO: "INVALID_AUDIO",
  AUDIO_TOO_LARGE: "AUDIO_TOO_LARGE",
  INVALID_CONTENT_TYPE: "INVALID_CONTENT_TYPE",
  UNSUPPORTED_AUDIO_FORMAT: "UNSUPPORTED_AUDIO_FORMAT",
  INVALID_TEXT: "INVALID_TEXT",
  TEXT_TOO_LONG: "TEXT_TOO_LONG",
  INVALID_PARAMETER: "INVALID_PARAMETER",

  // Credentials
  CREDENTIAL_MISSING: "CREDENTIAL_MISSING",
  CREDENTIAL_MALFORMED: "CREDENTIAL_MALFORMED",
  CREDENTIAL_REJECTED: "CREDENTIAL_REJECTED",
  CREDENTIAL_TIMEOUT: "CREDENTIAL_TIMEOUT",
  CREDENTIAL_UNAVAILABLE: "CREDENTIAL_UNAVAILABLE",

  // Upstream
  UPSTREAM_UNAVAILABLE: "UPSTREAM_UNAVAILABLE",
  UPSTREAM_RATE_LIMITED: "UPSTREAM_RATE_LIMITED",
  UPSTREAM_REJECTED: "UPSTREAM_REJECTED",
  UPSTREAM_AUTH_REJECTED: "UPSTREAM_AUTH_REJECTED",
  UPSTREAM_TIMEOUT: "UPSTREAM_TIMEOUT",
  NO_SPEECH_RECOGNIZED: "NO_SPEECH_RECOGNIZED",
  UNSUPPORTED_OPERATION: "UNSUPPORTED_OPERATION",

  // Config
  INVALID_CONFIG: "INVALID_CONFIG",
  MISSING_CONFIG: "MISSING_CONFIG",

  // Server / lifecycle
  CORS_REJECTED: "CORS_REJECTED",
  NOT_FOUND: "NOT_FOUND",
  NOT_READY: "NOT_READY",
  CLIENT_CLOSED_REQUEST: "CLIENT_CLOSED_REQUEST",

  // General
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** HTTP status for each error kind. */
export const HTTP_STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  validation: 400,
  credential: 401,
  upstream_rejected: 422,
  cancelled: 499,
  config: 500,
  internal: 500,
  upstream_unavailable: 503,
  upstream_timeout: 504,
};

/** Normalize anything thrown into a GatewayError. */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new InternalError(
    ErrorCodes.INTERNAL_ERROR,
    "An unexpected error occurred.",
    {
      detail: err instanceof Error ? err.message : String(err),
      cause: err,
    },
  );
}
