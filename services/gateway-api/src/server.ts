/**
 * HTTP server with all API endpoints.
 *
 * Endpoints:
 * - POST /v1/recognize — audio in, transcript JSON out
 * - POST /v1/synthesize — JSON text in, audio bytes out
 * - GET  / — service info
 * - GET  /healthz — liveness check
 * - GET  /readyz — readiness check (credential + adapter)
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import type { LimitsConfig, SpeechOperation } from "@speech-gateway/shared-types";
import {
  ErrorCodes,
  HTTP_STATUS_BY_KIND,
  ValidationError,
  createRequestId,
  toGatewayError,
  type RequestId,
} from "@speech-gateway/shared-types";
import type { Logger } from "@speech-gateway/logging";
import type { GatewayReply, SpeechGateway } from "./gateway.js";

export const SERVICE_NAME = "speech-gateway";
export const SERVICE_VERSION = "0.1.0";

/** Room for JSON framing around the payload. */
const JSON_OVERHEAD_BYTES = 64 * 1024;
/** How far past the body limit an upload is drained before reading stops. */
const DRAIN_FACTOR = 2;

const ROUTES: Readonly<Record<string, SpeechOperation>> = {
  "/v1/recognize": "recognize",
  "/v1/synthesize": "synthesize",
};

export interface ServerDeps {
  readonly gateway: SpeechGateway;
  readonly corsOrigins: readonly string[];
  readonly limits: LimitsConfig;
  readonly logger: Logger;
  ready: boolean;
}

/** Create and return the HTTP server (not yet listening). */
export function createGatewayServer(deps: ServerDeps): Server {
  const log = deps.logger.child({ component: "http-server" });

  const server = createServer(async (req, res) => {
    const requestId = createRequestId();
    const requestLog = log.child({ requestId, method: req.method, url: req.url });

    try {
      // Readiness gate — always allow /healthz (liveness check)
      if (!deps.ready && req.url !== "/healthz") {
        sendJson(res, 503, {
          error: "Gateway is starting up",
          code: ErrorCodes.NOT_READY,
          kind: "internal",
        });
        return;
      }

      if (handleCors(req, res, deps.corsOrigins)) return;

      const { pathname } = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";
      const operation = ROUTES[pathname];

      if (method === "POST" && operation !== undefined) {
        await handleSpeech(req, res, deps, operation, requestId, requestLog);
      } else if (method === "GET" && pathname === "/") {
        handleRoot(res, deps);
      } else if (method === "GET" && pathname === "/healthz") {
        handleHealthz(res);
      } else if (method === "GET" && pathname === "/readyz") {
        await handleReadyz(res, deps);
      } else {
        sendJson(res, 404, { error: "Not found", code: ErrorCodes.NOT_FOUND, kind: "validation" });
      }
    } catch (err) {
      handleError(res, err, requestId, requestLog);
    }
  });

  return server;
}

// ── Route Handlers ──

async function handleSpeech(
  req: IncomingMessage,
  res: ServerResponse,
  deps: ServerDeps,
  operation: SpeechOperation,
  requestId: RequestId,
  log: Logger,
): Promise<void> {
  // Client disconnect aborts the request; the upstream call is abandoned.
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      log.warn("Client disconnected before reply");
      controller.abort();
    }
  });

  const maxBytes =
    operation === "recognize"
      ? Math.ceil((deps.limits.maxAudioBytes * 4) / 3) + JSON_OVERHEAD_BYTES
      : deps.limits.maxTextChars * 4 + JSON_OVERHEAD_BYTES;
  let body: Buffer;
  try {
    body = await readBody(req, maxBytes, operation);
  } catch (err) {
    // Unread upload left on the socket; close it once the error reply is out.
    res.setHeader("Connection", "close");
    res.once("finish", () => req.destroy());
    throw err;
  }

  log.info("Speech request received", {
    operation,
    bodyBytes: body.length,
    contentType: req.headers["content-type"],
  });

  const { search } = new URL(req.url ?? "/", "http://localhost");
  const languageHint = req.headers["x-language-hint"];

  const reply = await deps.gateway.handle(
    {
      operation,
      contentType: req.headers["content-type"],
      body,
      query: new URLSearchParams(search),
      languageHint: typeof languageHint === "string" ? languageHint : undefined,
    },
    { requestId, signal: controller.signal },
  );

  writeReply(res, reply);
}

function handleRoot(res: ServerResponse, deps: ServerDeps): void {
  sendJson(res, 200, {
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    provider: deps.gateway.adapter.providerId,
    endpoints: {
      recognize: "POST /v1/recognize",
      synthesize: "POST /v1/synthesize",
      health: "GET /healthz",
      ready: "GET /readyz",
    },
  });
}

function handleHealthz(res: ServerResponse): void {
  sendJson(res, 200, { status: "ok", timestamp: new Date().toISOString() });
}

async function handleReadyz(res: ServerResponse, deps: ServerDeps): Promise<void> {
  const report = await deps.gateway.readiness();
  sendJson(res, report.ready ? 200 : 503, {
    status: report.ready ? "ready" : "not_ready",
    checks: report.checks,
    timestamp: new Date().toISOString(),
  });
}

// ── Helpers ──

/**
 * CORS handler with strict origin rejection.
 *
 * - corsOrigins non-empty and Origin not in it: 403 CORS_REJECTED
 *   (preflight gets a bare 204, which the browser treats as a refusal)
 * - corsOrigins empty: any origin is allowed
 * - no Origin header (server-to-server): passes without CORS headers
 *
 * Returns true if the response has been fully handled (caller should return).
 */
function handleCors(
  req: IncomingMessage,
  res: ServerResponse,
  allowedOrigins: readonly string[],
): boolean {
  const origin = req.headers["origin"];

  if (origin !== undefined && (allowedOrigins.length === 0 || allowedOrigins.includes(origin))) {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Language-Hint");
    res.setHeader("Access-Control-Expose-Headers", "X-Request-Id, X-Speech-Provider, X-Upstream-Attempts");
    res.setHeader("Access-Control-Max-Age", "86400");
  } else if (origin !== undefined && req.method !== "OPTIONS") {
    sendJson(res, 403, {
      error: "Origin not allowed",
      code: ErrorCodes.CORS_REJECTED,
      kind: "validation",
    });
    return true;
  }

  if (req.method === "OPTIONS") {
    res.writeHead(204);
    res.end();
    return true;
  }

  return false;
}

function handleError(
  res: ServerResponse,
  err: unknown,
  requestId: RequestId,
  log: Logger,
): void {
  const error = toGatewayError(err);
  const status = HTTP_STATUS_BY_KIND[error.kind];

  if (error.kind === "validation") {
    log.warn("Rejected request", { code: error.code, message: error.message });
  } else {
    log.error("Unhandled server error", error.toJSON());
  }

  if (res.headersSent || res.destroyed) return;
  res.setHeader("X-Request-Id", requestId);
  sendJson(res, status, error.toResponseBody(requestId));
}

function writeReply(res: ServerResponse, reply: GatewayReply): void {
  // Client already gone; nothing to write to.
  if (res.destroyed) return;
  res.writeHead(reply.status, { ...reply.headers, "Content-Length": String(reply.body.length) });
  res.end(reply.body);
}

function sendJson(
  res: ServerResponse,
  statusCode: number,
  body: unknown,
): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * Read the whole body, up to `maxBytes`. Past the limit the upload is
 * drained and discarded so a slightly oversized request still gets its
 * error reply; a body that keeps going past `DRAIN_FACTOR * maxBytes`
 * stops being read at once and the stream is left paused.
 */
export function readBody(
  req: Readable,
  maxBytes: number,
  operation: SpeechOperation,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let overflow = false;

    const tooLarge = (): ValidationError =>
      new ValidationError(
        operation === "recognize" ? ErrorCodes.AUDIO_TOO_LARGE : ErrorCodes.TEXT_TOO_LONG,
        `Request body too large: ${totalBytes} bytes. Max: ${maxBytes} bytes.`,
      );

    const onData = (chunk: Buffer): void => {
      totalBytes += chunk.length;
      if (totalBytes > maxBytes * DRAIN_FACTOR) {
        req.off("data", onData);
        req.off("end", onEnd);
        req.pause();
        reject(tooLarge());
        return;
      }
      if (overflow) return;
      if (totalBytes > maxBytes) {
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    };

    const onEnd = (): void => {
      if (overflow) {
        reject(tooLarge());
        return;
      }
      resolve(Buffer.concat(chunks));
    };

    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", reject);
  });
}
