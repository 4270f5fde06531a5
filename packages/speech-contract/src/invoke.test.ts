import { describe, it, expect, vi, beforeEach } from "vitest";
import { invoke } from "./invoke.js";
import type { SpeechAdapter, SpeechContext } from "./adapter.js";
import {
  Credential,
  ErrorCodes,
  ProviderIds,
  RequestCancelledError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  createRequestId,
  type AudioContentType,
  type RecognizeRequest,
  type SynthesizeRequest,
  type Transcript,
  type SynthesizedAudio,
} from "@speech-gateway/shared-types";
import { Logger } from "@speech-gateway/logging";

const credential = new Credential("test-token", Date.now() + 3_600_000, "static");
const logger = new Logger({ test: true });

const recognizeRequest: RecognizeRequest = {
  kind: "recognize",
  requestId: createRequestId("req_test"),
  audio: { data: Buffer.from("abc"), contentType: "audio/wav" },
  params: { language: "es-CO" },
};

const synthesizeRequest: SynthesizeRequest = {
  kind: "synthesize",
  requestId: createRequestId("req_test"),
  text: "Hola",
  params: { language: "es-CO", rate: 1, pitch: 0, format: "wav" },
};

const transcript: Transcript = {
  text: "hola",
  language: "es-CO",
  confidence: 0.9,
  providerId: ProviderIds.Fake,
  durationMs: 5,
};

const audio: SynthesizedAudio = {
  data: Buffer.from("RIFF"),
  contentType: "audio/wav",
  providerId: ProviderIds.Fake,
  durationMs: 5,
};

type RecognizeImpl = (ctx: SpeechContext) => Promise<Transcript>;
type SynthesizeImpl = (ctx: SpeechContext) => Promise<SynthesizedAudio>;

function stubAdapter(
  recognize: RecognizeImpl = async () => transcript,
  synthesize: SynthesizeImpl = async () => audio,
): SpeechAdapter {
  return {
    providerId: ProviderIds.Fake,
    name: "Stub",
    supportedAudioTypes: new Set<AudioContentType>(["audio/wav"]),
    recognize: vi.fn<SpeechAdapter["recognize"]>((_a, _p, _c, ctx) => recognize(ctx)),
    synthesize: vi.fn<SpeechAdapter["synthesize"]>((_t, _p, _c, ctx) => synthesize(ctx)),
    healthCheck: async () => ({ healthy: true, message: "ok", latencyMs: 0 }),
  };
}

/** Never settles, regardless of its signal. */
const hang = (): Promise<never> => new Promise<never>(() => undefined);

describe("invoke", () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
  });

  it("routes a recognize request to adapter.recognize", async () => {
    const adapter = stubAdapter();
    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 1_000,
      logger,
    });

    expect(result).toEqual({ ok: true, kind: "recognize", transcript, attempts: 1 });
    expect(adapter.recognize).toHaveBeenCalledOnce();
    expect(adapter.synthesize).not.toHaveBeenCalled();
  });

  it("routes a synthesize request to adapter.synthesize", async () => {
    const adapter = stubAdapter();
    const result = await invoke(adapter, synthesizeRequest, credential, {
      timeoutMs: 1_000,
      logger,
    });

    expect(result).toEqual({ ok: true, kind: "synthesize", audio, attempts: 1 });
    expect(adapter.recognize).not.toHaveBeenCalled();
  });

  it("passes the request id and an unaborted signal to the adapter", async () => {
    let seen: SpeechContext | undefined;
    const adapter = stubAdapter(async (ctx) => {
      seen = ctx;
      return transcript;
    });

    await invoke(adapter, recognizeRequest, credential, { timeoutMs: 1_000, logger });

    expect(seen?.requestId).toBe("req_test");
    expect(seen?.signal.aborted).toBe(false);
  });

  it("returns an upstream timeout when the adapter ignores its signal", async () => {
    const adapter = stubAdapter(hang);
    const started = Date.now();

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 50,
      logger,
    });

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UpstreamTimeoutError);
    expect(result.error.code).toBe(ErrorCodes.UPSTREAM_TIMEOUT);
    expect(result.attempts).toBe(1);
  });

  it("aborts the adapter signal on timeout", async () => {
    let seen: AbortSignal | undefined;
    const adapter = stubAdapter((ctx) => {
      seen = ctx.signal;
      return hang();
    });

    await invoke(adapter, recognizeRequest, credential, { timeoutMs: 20, logger });

    expect(seen?.aborted).toBe(true);
  });

  it("returns a cancelled error when the client signal aborts", async () => {
    const controller = new AbortController();
    const adapter = stubAdapter(hang);
    setTimeout(() => controller.abort(), 20);

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 5_000,
      signal: controller.signal,
      logger,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RequestCancelledError);
    expect(result.error.code).toBe(ErrorCodes.CLIENT_CLOSED_REQUEST);
  });

  it("returns a cancelled error when the client signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = stubAdapter(hang);

    const result = await invoke(adapter, synthesizeRequest, credential, {
      timeoutMs: 5_000,
      signal: controller.signal,
      logger,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("cancelled");
  });

  it("passes classified upstream errors through unchanged", async () => {
    const rejected = new UpstreamRejectedError(ErrorCodes.UPSTREAM_REJECTED, "bad audio");
    const adapter = stubAdapter(async () => {
      throw rejected;
    });

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 1_000,
      logger,
    });

    expect(result).toEqual({ ok: false, error: rejected, attempts: 1 });
  });

  it("wraps unclassified adapter failures as internal errors", async () => {
    const adapter = stubAdapter(async () => {
      throw new Error("boom");
    });

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 1_000,
      logger,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("internal");
    expect(result.error.detail).toBe("boom");
  });

  it("does not retry unless asked to", async () => {
    const adapter = stubAdapter(async () => {
      throw new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "down");
    });

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 1_000,
      logger,
    });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(1);
    expect(adapter.recognize).toHaveBeenCalledOnce();
  });

  it("counts every attempt when retries are enabled", async () => {
    let calls = 0;
    const adapter = stubAdapter(async () => {
      calls++;
      if (calls < 3) {
        throw new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "down");
      }
      return transcript;
    });

    const result = await invoke(adapter, recognizeRequest, credential, {
      timeoutMs: 1_000,
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5 },
      logger,
    });

    expect(result).toEqual({ ok: true, kind: "recognize", transcript, attempts: 3 });
  });
});
