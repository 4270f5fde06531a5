/**
 * Runtime validation guards for caller input.
 *
 * Every guard throws ValidationError, which the gateway maps to HTTP 400.
 */

import type { AudioContentType, SynthesisFormat } from "@speech-gateway/shared-types";
import { ValidationError, ErrorCodes } from "@speech-gateway/shared-types";

/** Audio MIME types the gateway accepts. */
export const SUPPORTED_AUDIO_TYPES: ReadonlySet<string> = new Set<AudioContentType>([
  "audio/wav",
  "audio/x-wav",
  "audio/pcm",
  "audio/ogg",
  "audio/webm",
  "audio/flac",
  "audio/mpeg",
]);

const SYNTHESIS_FORMATS: ReadonlySet<string> = new Set<SynthesisFormat>([
  "wav",
  "mulaw",
  "mp3",
  "ogg",
]);

/** Default max audio payload size: 10 MB. */
export const DEFAULT_MAX_AUDIO_BYTES = 10 * 1024 * 1024;

/** Default max synthesis text length. */
export const DEFAULT_MAX_TEXT_CHARS = 5000;

/** BCP-47 shaped tag: primary subtag plus optional region/script subtags. */
const LANGUAGE_TAG = /^[a-zA-Z]{2,3}(-[a-zA-Z0-9]{2,8})*$/;

function isAudioContentType(value: string): value is AudioContentType {
  return SUPPORTED_AUDIO_TYPES.has(value);
}

function isSynthesisFormat(value: string): value is SynthesisFormat {
  return SYNTHESIS_FORMATS.has(value);
}

/** Validate that a content type is a supported audio type. */
export function validateAudioContentType(
  contentType: string | undefined,
): AudioContentType {
  if (contentType == null || contentType.length === 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_CONTENT_TYPE,
      "Missing audio content type. Expected audio/wav, audio/ogg, or similar.",
    );
  }

  // Strip parameters (e.g., "audio/ogg; codecs=opus" → "audio/ogg")
  const baseType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";

  if (!isAudioContentType(baseType)) {
    throw new ValidationError(
      ErrorCodes.INVALID_CONTENT_TYPE,
      `Unsupported audio type: "${contentType}". Accepted: ${[...SUPPORTED_AUDIO_TYPES].join(", ")}`,
    );
  }

  return baseType;
}

/** Validate audio payload size. */
export function validateAudioSize(
  sizeBytes: number,
  maxBytes: number = DEFAULT_MAX_AUDIO_BYTES,
): void {
  if (sizeBytes <= 0) {
    throw new ValidationError(ErrorCodes.INVALID_AUDIO, "Audio payload is empty.");
  }
  if (sizeBytes > maxBytes) {
    throw new ValidationError(
      ErrorCodes.AUDIO_TOO_LARGE,
      `Audio payload too large: ${(sizeBytes / 1024 / 1024).toFixed(1)}MB. Max: ${(maxBytes / 1024 / 1024).toFixed(1)}MB.`,
    );
  }
}

/** Validate synthesis text: a non-blank string within the length limit. Returns it trimmed. */
export function validateText(
  value: unknown,
  maxChars: number = DEFAULT_MAX_TEXT_CHARS,
): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_TEXT,
      "text is required and cannot be empty.",
    );
  }
  const trimmed = value.trim();
  if (trimmed.length > maxChars) {
    throw new ValidationError(
      ErrorCodes.TEXT_TOO_LONG,
      `text too long: ${trimmed.length} characters. Max: ${maxChars}.`,
    );
  }
  return trimmed;
}

/** Validate an optional BCP-47 language tag, falling back to `fallback`. */
export function validateLanguage(value: unknown, fallback: string): string {
  if (value == null || value === "") return fallback;
  if (typeof value !== "string" || !LANGUAGE_TAG.test(value.trim())) {
    throw new ValidationError(
      ErrorCodes.INVALID_PARAMETER,
      `language must be a BCP-47 tag such as "es-CO", got: ${String(value)}`,
    );
  }
  return value.trim();
}

/** Plain decimal number as it may appear in a query string: no exponent, no hex, no blanks. */
const DECIMAL = /^-?\d+(\.\d+)?$/;
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * JSON numbers pass through; strings must match `pattern` exactly.
 * Booleans, arrays, objects and blank strings are not numbers.
 */
function toNumber(value: unknown, pattern: RegExp): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && pattern.test(value)) return Number(value);
  return undefined;
}

/** Validate an optional number within [min, max], falling back to `fallback`. */
export function validateNumberInRange(
  value: unknown,
  fieldName: string,
  min: number,
  max: number,
  fallback: number,
): number {
  if (value == null || value === "") return fallback;
  const num = toNumber(value, DECIMAL);
  if (num === undefined || !Number.isFinite(num) || num < min || num > max) {
    throw new ValidationError(
      ErrorCodes.INVALID_PARAMETER,
      `${fieldName} must be a number between ${min} and ${max}, got: ${JSON.stringify(value)}`,
    );
  }
  return num;
}

/** Validate an optional positive integer. */
export function validateOptionalPositiveInt(
  value: unknown,
  fieldName: string,
): number | undefined {
  if (value == null || value === "") return undefined;
  const num = toNumber(value, UNSIGNED_INTEGER);
  if (num === undefined || !Number.isSafeInteger(num) || num <= 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_PARAMETER,
      `${fieldName} must be a positive integer, got: ${JSON.stringify(value)}`,
    );
  }
  return num;
}

/** Validate an optional synthesis output format, defaulting to wav. */
export function validateSynthesisFormat(value: unknown): SynthesisFormat {
  if (value == null || value === "") return "wav";
  if (typeof value !== "string" || !isSynthesisFormat(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_PARAMETER,
      `format must be one of: ${[...SYNTHESIS_FORMATS].join(", ")}, got: ${String(value)}`,
    );
  }
  return value;
}

/** Validate an optional voice name: letters, digits, dashes and underscores. */
export function validateVoiceName(value: unknown): string | undefined {
  if (value == null || value === "") return undefined;
  if (typeof value !== "string" || !/^[A-Za-z0-9_-]{1,100}$/.test(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_PARAMETER,
      `voice must be a vendor voice name such as "es-CO-SalomeNeural", got: ${String(value)}`,
    );
  }
  return value;
}
