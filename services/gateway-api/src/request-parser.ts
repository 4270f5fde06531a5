/**
 * Turns the raw pieces of an HTTP request into a validated SpeechRequest.
 *
 * Nothing here touches credentials or the vendor: a request that fails
 * parsing never reaches the adapter.
 */

import type {
  AudioContentType,
  AudioPayload,
  LimitsConfig,
  RecognizeRequest,
  RequestId,
  SpeechOperation,
  SpeechRequest,
  SynthesizeRequest,
} from "@speech-gateway/shared-types";
import { ErrorCodes, ValidationError } from "@speech-gateway/shared-types";
import {
  validateAudioContentType,
  validateAudioSize,
  validateLanguage,
  validateNumberInRange,
  validateOptionalPositiveInt,
  validateSynthesisFormat,
  validateText,
  validateVoiceName,
} from "@speech-gateway/validation";

/** Prosody bounds accepted from callers. */
export const RATE_RANGE = { min: 0.5, max: 2.0, default: 1.0 } as const;
export const PITCH_RANGE = { min: -50, max: 50, default: 0 } as const;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** What the HTTP layer hands over. */
export interface RawSpeechRequest {
  readonly operation: SpeechOperation;
  readonly contentType: string | undefined;
  readonly body: Buffer;
  readonly query: URLSearchParams;
  /** X-Language-Hint header. */
  readonly languageHint: string | undefined;
}

export interface ParseContext {
  readonly requestId: RequestId;
  readonly defaultLanguage: string;
  readonly limits: LimitsConfig;
  /** Audio types the active adapter accepts. */
  readonly supportedAudioTypes: ReadonlySet<AudioContentType>;
}

/** Parse and validate. Throws ValidationError. */
export function parseSpeechRequest(raw: RawSpeechRequest, ctx: ParseContext): SpeechRequest {
  return raw.operation === "recognize"
    ? parseRecognize(raw, ctx)
    : parseSynthesize(raw, ctx);
}

function parseRecognize(raw: RawSpeechRequest, ctx: ParseContext): RecognizeRequest {
  // Synthesis-only providers accept no audio at all.
  if (ctx.supportedAudioTypes.size === 0) {
    throw new ValidationError(
      ErrorCodes.UNSUPPORTED_OPERATION,
      "The active speech provider does not support recognition.",
    );
  }

  let audio: AudioPayload;
  let language: unknown;

  if (isJson(raw.contentType)) {
    const body = parseJsonObject(raw.body);
    const contentType = body["contentType"];
    audio = {
      data: decodeBase64Audio(body["audio"]),
      contentType: validateAudioContentType(typeof contentType === "string" ? contentType : undefined),
      sampleRate: validateOptionalPositiveInt(body["sampleRate"], "sampleRate"),
    };
    language = body["language"];
  } else {
    audio = {
      data: raw.body,
      contentType: validateAudioContentType(raw.contentType),
      sampleRate: validateOptionalPositiveInt(raw.query.get("sampleRate"), "sampleRate"),
    };
    language = raw.query.get("language") ?? raw.languageHint;
  }

  validateAudioSize(audio.data.length, ctx.limits.maxAudioBytes);

  if (!ctx.supportedAudioTypes.has(audio.contentType)) {
    throw new ValidationError(
      ErrorCodes.UNSUPPORTED_AUDIO_FORMAT,
      `Audio type ${audio.contentType} is not supported by the active speech provider. Accepted: ${[...ctx.supportedAudioTypes].join(", ")}`,
    );
  }

  return Object.freeze({
    kind: "recognize",
    requestId: ctx.requestId,
    audio: Object.freeze(audio),
    params: Object.freeze({ language: validateLanguage(language, ctx.defaultLanguage) }),
  });
}

function parseSynthesize(raw: RawSpeechRequest, ctx: ParseContext): SynthesizeRequest {
  if (raw.contentType !== undefined && raw.contentType !== "" && !isJson(raw.contentType)) {
    throw new ValidationError(
      ErrorCodes.INVALID_CONTENT_TYPE,
      `Expected application/json, got: "${raw.contentType}"`,
    );
  }

  const body = parseJsonObject(raw.body);

  return Object.freeze({
    kind: "synthesize",
    requestId: ctx.requestId,
    text: validateText(body["text"], ctx.limits.maxTextChars),
    params: Object.freeze({
      language: validateLanguage(body["language"], ctx.defaultLanguage),
      voice: validateVoiceName(body["voice"]),
      rate: validateNumberInRange(body["rate"], "rate", RATE_RANGE.min, RATE_RANGE.max, RATE_RANGE.default),
      pitch: validateNumberInRange(body["pitch"], "pitch", PITCH_RANGE.min, PITCH_RANGE.max, PITCH_RANGE.default),
      format: validateSynthesisFormat(body["format"]),
    }),
  });
}

function isJson(contentType: string | undefined): boolean {
  return (contentType ?? "").split(";")[0]?.trim().toLowerCase() === "application/json";
}

function parseJsonObject(body: Buffer): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new ValidationError(ErrorCodes.INVALID_JSON, "Request body is not valid JSON.");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(ErrorCodes.INVALID_JSON, "Request body must be a JSON object.");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function decodeBase64Audio(value: unknown): Buffer {
  const compact = typeof value === "string" ? value.replace(/\s+/g, "") : "";
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new ValidationError(
      ErrorCodes.INVALID_AUDIO,
      "audio must be a non-empty base64 string.",
    );
  }
  return Buffer.from(compact, "base64");
}
