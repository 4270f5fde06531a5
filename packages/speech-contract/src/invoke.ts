/**
 * Adapter invocation: one bounded attempt by default.
 *
 * Translates a SpeechRequest into the matching adapter call and folds every
 * outcome into a SpeechResult. The timeout holds even when an adapter
 * ignores its abort signal: the call is raced against the bound.
 */

import type {
  Credential,
  SpeechRequest,
  SpeechResult,
} from "@speech-gateway/shared-types";
import {
  ErrorCodes,
  GatewayError,
  RequestCancelledError,
  UpstreamTimeoutError,
  toGatewayError,
} from "@speech-gateway/shared-types";
import type { Logger } from "@speech-gateway/logging";
import type { SpeechAdapter, SpeechContext } from "./adapter.js";
import { withRetry, type RetryOptions } from "./retry.js";

export interface InvokeOptions {
  /** Bound on each upstream attempt. */
  readonly timeoutMs: number;
  /** Client-side cancellation (e.g. the HTTP client disconnected). */
  readonly signal?: AbortSignal | undefined;
  /** Opt-in retry policy; omitted means a single attempt. */
  readonly retry?: Partial<Omit<RetryOptions, "signal" | "onRetry">> | undefined;
  readonly logger: Logger;
}

/** Invoke the adapter for one request. Never throws. */
export async function invoke(
  adapter: SpeechAdapter,
  request: SpeechRequest,
  credential: Credential,
  options: InvokeOptions,
): Promise<SpeechResult> {
  const log = options.logger.child({
    requestId: request.requestId,
    provider: adapter.providerId,
  });
  let attempts = 0;

  const retryOptions: Partial<RetryOptions> = {
    ...options.retry,
    signal: options.signal,
    onRetry: (err, attempt, delayMs) => {
      log.warn("Retrying upstream call", {
        attempt,
        delayMs: Math.round(delayMs),
        code: err.code,
      });
    },
  };

  try {
    if (request.kind === "recognize") {
      const transcript = await withRetry(() => {
        attempts++;
        return runBounded(
          (ctx) => adapter.recognize(request.audio, request.params, credential, ctx),
          request,
          options,
          log,
        );
      }, retryOptions);
      return { ok: true, kind: "recognize", transcript, attempts };
    }

    const audio = await withRetry(() => {
      attempts++;
      return runBounded(
        (ctx) => adapter.synthesize(request.text, request.params, credential, ctx),
        request,
        options,
        log,
      );
    }, retryOptions);
    return { ok: true, kind: "synthesize", audio, attempts };
  } catch (err) {
    const error = options.signal?.aborted && !(err instanceof GatewayError)
      ? cancelledError()
      : toGatewayError(err);
    return { ok: false, error, attempts };
  }
}

/** Run one adapter call raced against the timeout and the client signal. */
async function runBounded<T>(
  call: (ctx: SpeechContext) => Promise<T>,
  request: SpeechRequest,
  options: InvokeOptions,
  log: Logger,
): Promise<T> {
  const controller = new AbortController();
  const clientSignal = options.signal;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onClientAbort: (() => void) | undefined;

  const bound = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new UpstreamTimeoutError(
          ErrorCodes.UPSTREAM_TIMEOUT,
          "The speech service did not respond in time. Please try again.",
          { detail: `No upstream response within ${options.timeoutMs}ms` },
        ),
      );
    }, options.timeoutMs);

    if (clientSignal) {
      onClientAbort = () => {
        controller.abort();
        reject(cancelledError());
      };
      if (clientSignal.aborted) {
        onClientAbort();
      } else {
        clientSignal.addEventListener("abort", onClientAbort, { once: true });
      }
    }
  });

  try {
    const pending = call({ requestId: request.requestId, signal: controller.signal });
    // A call that loses the race may still settle; keep its rejection observed.
    pending.catch((err: unknown) => {
      if (controller.signal.aborted) {
        log.debug("Abandoned upstream call settled", { error: String(err) });
      }
    });
    return await Promise.race([pending, bound]);
  } finally {
    clearTimeout(timer);
    if (onClientAbort) clientSignal?.removeEventListener("abort", onClientAbort);
  }
}

function cancelledError(): RequestCancelledError {
  return new RequestCancelledError(
    ErrorCodes.CLIENT_CLOSED_REQUEST,
    "The request was cancelled by the client.",
  );
}
