import { describe, it, expect } from "vitest";
import { parseSpeechRequest, type ParseContext, type RawSpeechRequest } from "./request-parser.js";
import {
  ErrorCodes,
  GatewayError,
  createRequestId,
  type AudioContentType,
} from "@speech-gateway/shared-types";

const ctx: ParseContext = {
  requestId: createRequestId("req_parse"),
  defaultLanguage: "es-CO",
  limits: { maxAudioBytes: 1024, maxTextChars: 20 },
  supportedAudioTypes: new Set<AudioContentType>(["audio/wav", "audio/x-wav", "audio/pcm"]),
};

function raw(overrides: Partial<RawSpeechRequest>): RawSpeechRequest {
  return {
    operation: "recognize",
    contentType: "audio/wav",
    body: Buffer.from("RIFF-ish"),
    query: new URLSearchParams(),
    languageHint: undefined,
    ...overrides,
  };
}

function json(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value));
}

/** Code of the GatewayError thrown by fn. */
function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    return err instanceof GatewayError ? err.code : "NOT_A_GATEWAY_ERROR";
  }
  return "DID_NOT_THROW";
}

describe("parseSpeechRequest — recognize", () => {
  it("accepts raw audio with language and sample rate from the query", () => {
    const request = parseSpeechRequest(
      raw({ query: new URLSearchParams("language=es-MX&sampleRate=8000") }),
      ctx,
    );

    expect(request.kind).toBe("recognize");
    if (request.kind !== "recognize") return;
    expect(request.requestId).toBe("req_parse");
    expect(request.audio.contentType).toBe("audio/wav");
    expect(request.audio.sampleRate).toBe(8000);
    expect(request.audio.data.toString()).toBe("RIFF-ish");
    expect(request.params.language).toBe("es-MX");
  });

  it("refuses recognition when the provider accepts no audio types", () => {
    const synthesisOnly: ParseContext = { ...ctx, supportedAudioTypes: new Set<AudioContentType>() };

    expect(codeOf(() => parseSpeechRequest(raw({}), synthesisOnly))).toBe(ErrorCodes.UNSUPPORTED_OPERATION);
  });

  it.each([
    ["a boolean", true],
    ["an array", [16000]],
    ["a float string", "16000.5"],
  ])("rejects %s sampleRate in a JSON body", (_label, sampleRate) => {
    const request = raw({
      contentType: "application/json",
      body: json({ audio: Buffer.from("RIFF-ish").toString("base64"), contentType: "audio/wav", sampleRate }),
    });

    expect(codeOf(() => parseSpeechRequest(request, ctx))).toBe(ErrorCodes.INVALID_PARAMETER);
  });

  it("falls back to the language hint, then the default", () => {
    const hinted = parseSpeechRequest(raw({ languageHint: "en-US" }), ctx);
    const plain = parseSpeechRequest(raw({}), ctx);

    expect(hinted.kind === "recognize" && hinted.params.language).toBe("en-US");
    expect(plain.kind === "recognize" && plain.params.language).toBe("es-CO");
  });

  it("strips content type parameters", () => {
    const request = parseSpeechRequest(raw({ contentType: "Audio/X-WAV; rate=16000" }), ctx);
    expect(request.kind === "recognize" && request.audio.contentType).toBe("audio/x-wav");
  });

  it("accepts a JSON body with base64 audio", () => {
    const request = parseSpeechRequest(
      raw({
        contentType: "application/json",
        body: json({ audio: "aG9sYQ==", contentType: "audio/pcm", language: "es-ES", sampleRate: 16000 }),
      }),
      ctx,
    );

    expect(request.kind).toBe("recognize");
    if (request.kind !== "recognize") return;
    expect(request.audio.data.toString("utf8")).toBe("hola");
    expect(request.audio.contentType).toBe("audio/pcm");
    expect(request.audio.sampleRate).toBe(16000);
    expect(request.params.language).toBe("es-ES");
  });

  it("returns a frozen request", () => {
    const request = parseSpeechRequest(raw({}), ctx);
    expect(Object.isFrozen(request)).toBe(true);
    expect(request.kind === "recognize" && Object.isFrozen(request.audio)).toBe(true);
  });

  it.each([
    ["missing content type", raw({ contentType: undefined }), ErrorCodes.INVALID_CONTENT_TYPE],
    ["non-audio content type", raw({ contentType: "video/mp4" }), ErrorCodes.INVALID_CONTENT_TYPE],
    ["type the adapter cannot take", raw({ contentType: "audio/ogg" }), ErrorCodes.UNSUPPORTED_AUDIO_FORMAT],
    ["empty body", raw({ body: Buffer.alloc(0) }), ErrorCodes.INVALID_AUDIO],
    ["oversized body", raw({ body: Buffer.alloc(1025) }), ErrorCodes.AUDIO_TOO_LARGE],
    ["bad language", raw({ query: new URLSearchParams("language=not a tag") }), ErrorCodes.INVALID_PARAMETER],
    ["bad sample rate", raw({ query: new URLSearchParams("sampleRate=-5") }), ErrorCodes.INVALID_PARAMETER],
    [
      "invalid base64",
      raw({ contentType: "application/json", body: json({ audio: "not base64!", contentType: "audio/wav" }) }),
      ErrorCodes.INVALID_AUDIO,
    ],
    [
      "missing audio field",
      raw({ contentType: "application/json", body: json({ contentType: "audio/wav" }) }),
      ErrorCodes.INVALID_AUDIO,
    ],
    [
      "malformed JSON",
      raw({ contentType: "application/json", body: Buffer.from("{") }),
      ErrorCodes.INVALID_JSON,
    ],
  ])("rejects %s", (_label, request, code) => {
    expect(codeOf(() => parseSpeechRequest(request, ctx))).toBe(code);
  });
});

describe("parseSpeechRequest — synthesize", () => {
  const synth = (body: unknown, contentType: string | undefined = "application/json"): RawSpeechRequest =>
    raw({ operation: "synthesize", contentType, body: json(body) });

  it("applies defaults and trims text", () => {
    const request = parseSpeechRequest(synth({ text: "  Hola  " }), ctx);

    expect(request).toEqual({
      kind: "synthesize",
      requestId: "req_parse",
      text: "Hola",
      params: { language: "es-CO", voice: undefined, rate: 1, pitch: 0, format: "wav" },
    });
  });

  it("reads every parameter", () => {
    const request = parseSpeechRequest(
      synth({ text: "Hola", language: "es-MX", voice: "es-MX-DaliaNeural", rate: 1.5, pitch: -10, format: "mp3" }),
      ctx,
    );

    expect(request.kind === "synthesize" && request.params).toEqual({
      language: "es-MX",
      voice: "es-MX-DaliaNeural",
      rate: 1.5,
      pitch: -10,
      format: "mp3",
    });
  });

  it("accepts a body without a content type", () => {
    const request = parseSpeechRequest(synth({ text: "Hola" }, undefined), ctx);
    expect(request.kind).toBe("synthesize");
  });

  it("rejects a JSON array body", () => {
    expect(() => parseSpeechRequest(synth([1]), ctx)).toThrow("Request body must be a JSON object.");
  });

  it.each([
    ["non-JSON content type", synth({ text: "Hola" }, "text/plain"), ErrorCodes.INVALID_CONTENT_TYPE],
    ["missing text", synth({}), ErrorCodes.INVALID_TEXT],
    ["blank text", synth({ text: "   " }), ErrorCodes.INVALID_TEXT],
    ["text over the limit", synth({ text: "x".repeat(21) }), ErrorCodes.TEXT_TOO_LONG],
    ["rate out of range", synth({ text: "Hola", rate: 3 }), ErrorCodes.INVALID_PARAMETER],
    ["pitch out of range", synth({ text: "Hola", pitch: 51 }), ErrorCodes.INVALID_PARAMETER],
    ["unknown format", synth({ text: "Hola", format: "aac" }), ErrorCodes.INVALID_PARAMETER],
    ["bad voice name", synth({ text: "Hola", voice: "<voice>" }), ErrorCodes.INVALID_PARAMETER],
  ])("rejects %s", (_label, request, code) => {
    expect(codeOf(() => parseSpeechRequest(request, ctx))).toBe(code);
  });
});
