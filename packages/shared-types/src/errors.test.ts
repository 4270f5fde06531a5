import { describe, it, expect } from "vitest";
import {
  ConfigError,
  CredentialError,
  ValidationError,
  UpstreamUnavailableError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  InternalError,
  ErrorCodes,
  HTTP_STATUS_BY_KIND,
  toGatewayError,
} from "./errors.js";

describe("error taxonomy", () => {
  it("assigns a stable kind to each class", () => {
    expect(new ConfigError(ErrorCodes.MISSING_CONFIG, "x").kind).toBe("config");
    expect(new CredentialError(ErrorCodes.CREDENTIAL_MISSING, "x").kind).toBe("credential");
    expect(new ValidationError(ErrorCodes.INVALID_TEXT, "x").kind).toBe("validation");
    expect(new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "x").kind).toBe(
      "upstream_unavailable",
    );
    expect(new UpstreamRejectedError(ErrorCodes.UPSTREAM_REJECTED, "x").kind).toBe(
      "upstream_rejected",
    );
    expect(new UpstreamTimeoutError(ErrorCodes.UPSTREAM_TIMEOUT, "x").kind).toBe(
      "upstream_timeout",
    );
  });

  it("uses the class name as error name", () => {
    const err = new ValidationError(ErrorCodes.INVALID_TEXT, "Bad text");
    expect(err.name).toBe("ValidationError");
    expect(err).toBeInstanceOf(Error);
  });

  it("serializes to JSON with detail and cause", () => {
    const err = new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "Vendor down", {
      detail: "HTTP 503: backend overloaded",
      cause: new Error("root cause"),
    });
    const json = err.toJSON();
    expect(json).toMatchObject({
      name: "UpstreamUnavailableError",
      kind: "upstream_unavailable",
      code: "UPSTREAM_UNAVAILABLE",
      message: "Vendor down",
      detail: "HTTP 503: backend overloaded",
    });
    expect(json["cause"]).toContain("root cause");
    expect(json["timestamp"]).toBeDefined();
  });

  it("response body never carries detail or cause", () => {
    const err = new CredentialError(ErrorCodes.CREDENTIAL_REJECTED, "Credential refused", {
      detail: "invalid_grant for svc@example.iam",
    });
    expect(err.toResponseBody("req_1")).toEqual({
      error: "Credential refused",
      code: "CREDENTIAL_REJECTED",
      kind: "credential",
      requestId: "req_1",
    });
  });

  it("marks only rejected upstream errors as non-retryable", () => {
    expect(new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "x").retryable).toBe(true);
    expect(new UpstreamTimeoutError(ErrorCodes.UPSTREAM_TIMEOUT, "x").retryable).toBe(true);
    expect(new UpstreamRejectedError(ErrorCodes.UPSTREAM_REJECTED, "x").retryable).toBe(false);
  });

  it("maps kinds to HTTP status", () => {
    expect(HTTP_STATUS_BY_KIND.validation).toBe(400);
    expect(HTTP_STATUS_BY_KIND.credential).toBe(401);
    expect(HTTP_STATUS_BY_KIND.upstream_unavailable).toBe(503);
    expect(HTTP_STATUS_BY_KIND.upstream_timeout).toBe(504);
  });

  describe("toGatewayError", () => {
    it("passes gateway errors through", () => {
      const err = new ValidationError(ErrorCodes.INVALID_TEXT, "x");
      expect(toGatewayError(err)).toBe(err);
    });

    it("wraps unknown errors with a generic message", () => {
      const wrapped = toGatewayError(new Error("socket exploded"));
      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe("An unexpected error occurred.");
      expect(wrapped.detail).toBe("socket exploded");
    });
  });
});
