/**
 * Request gateway — one speech request, end to end.
 *
 * raw request → validate → credential → adapter → HTTP reply
 *
 * Never throws: every failure becomes a structured error reply whose
 * status follows the error kind.
 */

import type {
  ErrorKind,
  GatewayError,
  RequestId,
  SpeechGatewayConfig,
  SpeechResult,
} from "@speech-gateway/shared-types";
import {
  ErrorCodes,
  HTTP_STATUS_BY_KIND,
  createRequestId,
  toGatewayError,
} from "@speech-gateway/shared-types";
import { invoke, type AdapterHealthStatus, type SpeechAdapter } from "@speech-gateway/speech-contract";
import type { CredentialHealth, CredentialProvider } from "@speech-gateway/credentials";
import type { Logger } from "@speech-gateway/logging";
import { parseSpeechRequest, type RawSpeechRequest } from "./request-parser.js";
import { RequestLifecycle } from "./lifecycle.js";

/** Failures an operator has to act on; the rest are the caller's or the vendor's. */
const OPERATOR_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["config", "credential", "internal"]);

export interface GatewayReply {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
}

export interface HandleOptions {
  readonly requestId?: RequestId | undefined;
  /** Aborted when the client goes away. */
  readonly signal?: AbortSignal | undefined;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly checks: {
    readonly credential: CredentialHealth;
    readonly adapter: AdapterHealthStatus;
  };
}

export interface SpeechGatewayDeps {
  readonly adapter: SpeechAdapter;
  readonly credentials: CredentialProvider;
  readonly config: Pick<SpeechGatewayConfig, "defaultLanguage" | "limits" | "upstream">;
  readonly logger: Logger;
}

export class SpeechGateway {
  private readonly deps: SpeechGatewayDeps;
  private readonly log: Logger;

  constructor(deps: SpeechGatewayDeps) {
    this.deps = deps;
    this.log = deps.logger.child({ component: "gateway" });
  }

  get adapter(): SpeechAdapter {
    return this.deps.adapter;
  }

  async handle(raw: RawSpeechRequest, options: HandleOptions = {}): Promise<GatewayReply> {
    const requestId = options.requestId ?? createRequestId();
    const log = this.log.child({ requestId, operation: raw.operation });
    const lifecycle = new RequestLifecycle(log);
    const { config, adapter, credentials } = this.deps;

    let attempts = 0;
    try {
      lifecycle.transition("validating");
      const request = parseSpeechRequest(raw, {
        requestId,
        defaultLanguage: config.defaultLanguage,
        limits: config.limits,
        supportedAudioTypes: adapter.supportedAudioTypes,
      });

      lifecycle.transition("awaiting_credential");
      const credential = await credentials.getCredential(options.signal);

      lifecycle.transition("invoking");
      const result = await invoke(adapter, request, credential, {
        timeoutMs: config.upstream.timeoutMs,
        signal: options.signal,
        retry: { maxRetries: config.upstream.maxRetries },
        logger: log,
      });
      attempts = result.attempts;

      if (!result.ok) {
        if (result.error.code === ErrorCodes.UPSTREAM_AUTH_REJECTED) {
          credentials.invalidate();
        }
        return this.fail(lifecycle, result.error, requestId, attempts, log);
      }

      lifecycle.transition("completed");
      log.info("Request completed", {
        provider: adapter.providerId,
        attempts,
        elapsedMs: lifecycle.elapsedMs,
      });
      return successReply(result, requestId);
    } catch (err) {
      return this.fail(lifecycle, toGatewayError(err), requestId, attempts, log);
    }
  }

  /** Credential health plus adapter health, for /readyz. */
  async readiness(): Promise<ReadinessReport> {
    const [credential, adapter] = await Promise.all([
      this.deps.credentials.checkHealth(),
      this.deps.adapter.healthCheck(),
    ]);
    return {
      ready: credential.healthy && adapter.healthy,
      checks: { credential, adapter },
    };
  }

  private fail(
    lifecycle: RequestLifecycle,
    error: GatewayError,
    requestId: RequestId,
    attempts: number,
    log: Logger,
  ): GatewayReply {
    if (lifecycle.state !== "failed" && lifecycle.state !== "completed") {
      lifecycle.transition("failed");
    }

    const status = HTTP_STATUS_BY_KIND[error.kind];
    const data = { status, attempts, elapsedMs: lifecycle.elapsedMs, error: error.toJSON() };
    if (OPERATOR_KINDS.has(error.kind)) {
      log.error("Request failed", data);
    } else {
      log.warn("Request failed", data);
    }

    return {
      status,
      headers: {
        "Content-Type": "application/json",
        "X-Request-Id": requestId,
        ...(attempts > 0 ? { "X-Upstream-Attempts": String(attempts) } : {}),
      },
      body: Buffer.from(JSON.stringify(error.toResponseBody(requestId))),
    };
  }
}

function successReply(
  result: Extract<SpeechResult, { ok: true }>,
  requestId: RequestId,
): GatewayReply {
  if (result.kind === "recognize") {
    const { transcript } = result;
    return {
      status: 200,
      headers: {
        "Content-Type": "application/json",
        "X-Request-Id": requestId,
        "X-Upstream-Attempts": String(result.attempts),
      },
      body: Buffer.from(
        JSON.stringify({
          requestId,
          text: transcript.text,
          language: transcript.language,
          confidence: transcript.confidence,
          provider: transcript.providerId,
          durationMs: transcript.durationMs,
        }),
      ),
    };
  }

  return {
    status: 200,
    headers: {
      "Content-Type": result.audio.contentType,
      "X-Request-Id": requestId,
      "X-Speech-Provider": result.audio.providerId,
      "X-Upstream-Attempts": String(result.attempts),
    },
    body: result.audio.data,
  };
}
