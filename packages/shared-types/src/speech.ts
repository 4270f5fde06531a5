/**
 * Core domain types for the speech request pipeline.
 *
 * HTTP request → SpeechRequest → adapter → SpeechResult → HTTP response.
 */

import type { ProviderId, RequestId } from "./branded.js";
import type { GatewayError } from "./errors.js";

// ── Audio ──

/** Audio content types accepted for recognition. */
export type AudioContentType =
  | "audio/wav"
  | "audio/x-wav"
  | "audio/pcm"
  | "audio/ogg"
  | "audio/webm"
  | "audio/flac"
  | "audio/mpeg";

/** Output encodings a caller may ask synthesis for. */
export type SynthesisFormat = "wav" | "mulaw" | "mp3" | "ogg";

export type SpeechOperation = "recognize" | "synthesize";

/** Incoming audio payload. */
export interface AudioPayload {
  readonly data: Buffer;
  readonly contentType: AudioContentType;
  /** Sample rate hint (Hz). Required by some vendors for headerless audio. */
  readonly sampleRate?: number | undefined;
}

// ── Requests ──

export interface RecognizeParams {
  /** BCP-47 language tag, e.g. "es-CO". */
  readonly language: string;
}

export interface SynthesizeParams {
  readonly language: string;
  /** Vendor voice name. Vendor default when absent. */
  readonly voice?: string | undefined;
  /** Speaking rate multiplier, 1.0 = normal. */
  readonly rate: number;
  /** Pitch shift in percent, 0 = unchanged. */
  readonly pitch: number;
  readonly format: SynthesisFormat;
}

export interface RecognizeRequest {
  readonly kind: "recognize";
  readonly requestId: RequestId;
  readonly audio: AudioPayload;
  readonly params: RecognizeParams;
}

export interface SynthesizeRequest {
  readonly kind: "synthesize";
  readonly requestId: RequestId;
  readonly text: string;
  readonly params: SynthesizeParams;
}

/** One validated unit of work. Always exactly one operation kind. */
export type SpeechRequest = RecognizeRequest | SynthesizeRequest;

// ── Results ──

/** Normalized recognition output, vendor-agnostic. */
export interface Transcript {
  readonly text: string;
  readonly language: string;
  /** Confidence 0.0–1.0, null when the vendor does not report one. */
  readonly confidence: number | null;
  readonly providerId: ProviderId;
  readonly durationMs: number;
}

/** Normalized synthesis output. */
export interface SynthesizedAudio {
  readonly data: Buffer;
  /** MIME type of `data`. */
  readonly contentType: string;
  readonly providerId: ProviderId;
  readonly durationMs: number;
}

/**
 * Outcome of one adapter invocation. `attempts` counts upstream calls,
 * so retries are never hidden from the caller.
 */
export type SpeechResult =
  | {
      readonly ok: true;
      readonly kind: "recognize";
      readonly transcript: Transcript;
      readonly attempts: number;
    }
  | {
      readonly ok: true;
      readonly kind: "synthesize";
      readonly audio: SynthesizedAudio;
      readonly attempts: number;
    }
  | {
      readonly ok: false;
      readonly error: GatewayError;
      readonly attempts: number;
    };
