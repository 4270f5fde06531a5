import { describe, it, expect, vi, beforeEach } from "vitest";
import { SpeechGateway, type SpeechGatewayDeps } from "./gateway.js";
import type { RawSpeechRequest } from "./request-parser.js";
import { Logger } from "@speech-gateway/logging";
import {
  Credential,
  CredentialError,
  ErrorCodes,
  UpstreamRejectedError,
  UpstreamUnavailableError,
  createRequestId,
} from "@speech-gateway/shared-types";
import { FakeSpeechAdapter, decodeWav, encodeWav } from "@speech-gateway/speech-fake";
import { ElevenLabsSpeechAdapter } from "@speech-gateway/speech-elevenlabs";
import {
  CachedCredentialProvider,
  StaticCredentialSource,
  type CredentialHealth,
  type CredentialProvider,
} from "@speech-gateway/credentials";

const logger = new Logger();

const config: SpeechGatewayDeps["config"] = {
  defaultLanguage: "es-CO",
  limits: { maxAudioBytes: 64 * 1024, maxTextChars: 200 },
  upstream: { timeoutMs: 1_000, credentialTimeoutMs: 1_000, maxRetries: 0 },
};

/** Credential provider whose calls can be counted and whose failure can be forced. */
class StubCredentials implements CredentialProvider {
  failure: Error | undefined;
  readonly getCredential = vi.fn(async (): Promise<Credential> => {
    if (this.failure) throw this.failure;
    return new Credential("test-token", Date.now() + 3_600_000, "stub");
  });
  readonly invalidate = vi.fn((): void => undefined);

  async checkHealth(): Promise<CredentialHealth> {
    return this.failure
      ? { healthy: false, message: this.failure.message }
      : { healthy: true, message: "ok" };
  }
}

function recognize(text: string, overrides: Partial<RawSpeechRequest> = {}): RawSpeechRequest {
  return {
    operation: "recognize",
    contentType: "audio/wav",
    body: encodeWav(Buffer.from(text, "utf8")),
    query: new URLSearchParams(),
    languageHint: undefined,
    ...overrides,
  };
}

function synthesize(body: unknown): RawSpeechRequest {
  return {
    operation: "synthesize",
    contentType: "application/json",
    body: Buffer.from(JSON.stringify(body)),
    query: new URLSearchParams(),
    languageHint: undefined,
  };
}

function parseBody(body: Buffer): unknown {
  return JSON.parse(body.toString("utf8"));
}

describe("SpeechGateway", () => {
  let adapter: FakeSpeechAdapter;
  let credentials: StubCredentials;

  function makeGateway(upstream: Partial<SpeechGatewayDeps["config"]["upstream"]> = {}): SpeechGateway {
    return new SpeechGateway({
      adapter,
      credentials,
      config: { ...config, upstream: { ...config.upstream, ...upstream } },
      logger,
    });
  }

  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
    adapter = new FakeSpeechAdapter({}, logger);
    credentials = new StubCredentials();
  });

  it("answers a recognize request with a transcript body", async () => {
    const reply = await makeGateway().handle(recognize("hola mundo"), {
      requestId: createRequestId("req_gw"),
    });

    expect(reply.status).toBe(200);
    expect(reply.headers["Content-Type"]).toBe("application/json");
    expect(reply.headers["X-Request-Id"]).toBe("req_gw");
    expect(reply.headers["X-Upstream-Attempts"]).toBe("1");
    expect(parseBody(reply.body)).toEqual({
      requestId: "req_gw",
      text: "hola mundo",
      language: "es-CO",
      confidence: 1,
      provider: "fake",
      durationMs: expect.any(Number),
    });
  });

  it("answers a synthesize request with audio bytes", async () => {
    const reply = await makeGateway().handle(synthesize({ text: "Buenas tardes" }));

    expect(reply.status).toBe(200);
    expect(reply.headers["Content-Type"]).toBe("audio/wav");
    expect(reply.headers["X-Speech-Provider"]).toBe("fake");
    expect(decodeWav(reply.body)?.data.toString("utf8")).toBe("Buenas tardes");
  });

  it("rejects invalid input before fetching a credential or calling the adapter", async () => {
    const reply = await makeGateway().handle(synthesize({ text: "" }));

    expect(reply.status).toBe(400);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.INVALID_TEXT, kind: "validation" });
    expect(reply.headers["X-Upstream-Attempts"]).toBeUndefined();
    expect(credentials.getCredential).not.toHaveBeenCalled();
    expect(adapter.calls).toEqual({ recognize: 0, synthesize: 0 });
  });

  it.each([
    { pitch: true },
    { pitch: [] },
    { rate: [1.5] },
    { pitch: " " },
  ])("rejects non-numeric prosody %j without calling the adapter", async (params) => {
    const reply = await makeGateway().handle(synthesize({ text: "hola", ...params }));

    expect(reply.status).toBe(400);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.INVALID_PARAMETER, kind: "validation" });
    expect(adapter.calls).toEqual({ recognize: 0, synthesize: 0 });
  });

  it("rejects a boolean sampleRate in a JSON recognize body", async () => {
    const reply = await makeGateway().handle(
      recognize("hola", {
        contentType: "application/json",
        body: Buffer.from(
          JSON.stringify({
            audio: encodeWav(Buffer.from("hola", "utf8")).toString("base64"),
            contentType: "audio/wav",
            sampleRate: true,
          }),
        ),
      }),
    );

    expect(reply.status).toBe(400);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.INVALID_PARAMETER });
    expect(adapter.calls).toEqual({ recognize: 0, synthesize: 0 });
  });

  it("answers 400 to recognition on a synthesis-only provider without a vendor call", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch");
    const gateway = new SpeechGateway({
      adapter: new ElevenLabsSpeechAdapter({ apiKey: "test-api-key", voiceId: "voice-123" }, logger),
      credentials,
      config,
      logger,
    });

    const reply = await gateway.handle(recognize("hola"));

    expect(reply.status).toBe(400);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.UNSUPPORTED_OPERATION, kind: "validation" });
    expect(credentials.getCredential).not.toHaveBeenCalled();
    expect(fetchSpy).not.toHaveBeenCalled();
    fetchSpy.mockRestore();
  });

  it("maps a credential failure to 401 without calling the adapter", async () => {
    credentials.failure = new CredentialError(
      ErrorCodes.CREDENTIAL_MISSING,
      "The speech service credential file could not be read.",
      { detail: "ENOENT: /etc/speech/key.json" },
    );

    const reply = await makeGateway().handle(recognize("hola"), { requestId: createRequestId("req_cred") });

    expect(reply.status).toBe(401);
    expect(parseBody(reply.body)).toEqual({
      error: "The speech service credential file could not be read.",
      code: ErrorCodes.CREDENTIAL_MISSING,
      kind: "credential",
      requestId: "req_cred",
    });
    expect(adapter.calls.recognize).toBe(0);
  });

  it("invalidates the credential when the vendor refuses it", async () => {
    adapter.configure({
      failure: new UpstreamRejectedError(ErrorCodes.UPSTREAM_AUTH_REJECTED, "The speech service refused the credential."),
    });

    const reply = await makeGateway().handle(recognize("hola"));

    expect(reply.status).toBe(422);
    expect(reply.headers["X-Upstream-Attempts"]).toBe("1");
    expect(credentials.invalidate).toHaveBeenCalledTimes(1);
  });

  it("keeps the credential on other vendor rejections", async () => {
    adapter.configure({
      failure: new UpstreamRejectedError(ErrorCodes.NO_SPEECH_RECOGNIZED, "No speech was recognized in the audio."),
    });

    const reply = await makeGateway().handle(recognize("hola"));

    expect(reply.status).toBe(422);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.NO_SPEECH_RECOGNIZED });
    expect(credentials.invalidate).not.toHaveBeenCalled();
  });

  it("never exposes operator detail in the response body", async () => {
    adapter.configure({
      failure: new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "The speech service is unavailable.", {
        detail: "Google HTTP 503: backend shard 7 down",
      }),
    });

    const reply = await makeGateway().handle(recognize("hola"), { requestId: createRequestId("req_503") });

    expect(reply.status).toBe(503);
    expect(parseBody(reply.body)).toEqual({
      error: "The speech service is unavailable.",
      code: ErrorCodes.UPSTREAM_UNAVAILABLE,
      kind: "upstream_unavailable",
      requestId: "req_503",
    });
  });

  it("reports every attempt when retries are enabled", async () => {
    adapter.configure({
      failure: new UpstreamUnavailableError(ErrorCodes.UPSTREAM_UNAVAILABLE, "The speech service is unavailable."),
    });

    const reply = await makeGateway({ maxRetries: 1 }).handle(recognize("hola"));

    expect(reply.status).toBe(503);
    expect(reply.headers["X-Upstream-Attempts"]).toBe("2");
    expect(adapter.calls.recognize).toBe(2);
  });

  it("answers 504 within the bound when the adapter ignores its signal", async () => {
    adapter.configure({ latencyMs: 2_000, honourSignal: false });
    const startMs = Date.now();

    const reply = await makeGateway({ timeoutMs: 50 }).handle(recognize("hola"));

    expect(reply.status).toBe(504);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.UPSTREAM_TIMEOUT });
    expect(Date.now() - startMs).toBeLessThan(1_000);
  });

  it("answers 499 when the client has gone away", async () => {
    const controller = new AbortController();
    adapter.configure({ latencyMs: 1_000 });
    const gateway = new SpeechGateway({
      adapter,
      credentials: new CachedCredentialProvider(new StaticCredentialSource("test-token"), logger),
      config,
      logger,
    });

    const pending = gateway.handle(recognize("hola"), { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);
    const reply = await pending;

    expect(reply.status).toBe(499);
    expect(parseBody(reply.body)).toMatchObject({ code: ErrorCodes.CLIENT_CLOSED_REQUEST, kind: "cancelled" });
  });

  describe("readiness", () => {
    it("is ready when credential and adapter are healthy", async () => {
      const report = await makeGateway().readiness();

      expect(report.ready).toBe(true);
      expect(report.checks.credential).toEqual({ healthy: true, message: "ok" });
      expect(report.checks.adapter.healthy).toBe(true);
    });

    it("is not ready when no credential can be obtained", async () => {
      credentials.failure = new CredentialError(ErrorCodes.CREDENTIAL_REJECTED, "Credential refused.");

      const report = await makeGateway().readiness();

      expect(report.ready).toBe(false);
      expect(report.checks.credential).toEqual({ healthy: false, message: "Credential refused." });
    });
  });
});
