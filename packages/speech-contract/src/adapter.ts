/**
 * Speech adapter abstraction.
 *
 * Every vendor integration implements this interface. The gateway depends
 * only on this contract, never on a concrete adapter.
 */

import type {
  AudioContentType,
  AudioPayload,
  Credential,
  ProviderId,
  RecognizeParams,
  RequestId,
  SynthesizeParams,
  SynthesizedAudio,
  Transcript,
} from "@speech-gateway/shared-types";

/** Per-call context handed to the adapter. */
export interface SpeechContext {
  /** Correlation ID for tracing this request. */
  readonly requestId: RequestId;
  /** Aborted on timeout or client disconnect. Adapters pass it to fetch. */
  readonly signal: AbortSignal;
}

/** Health status of an adapter. */
export interface AdapterHealthStatus {
  readonly healthy: boolean;
  readonly message: string;
  readonly latencyMs: number;
}

/**
 * Narrow capability interface over a speech vendor.
 *
 * Implementations:
 * - speech-google: Cloud Speech-to-Text / Text-to-Speech REST
 * - speech-azure: Azure Speech REST with SSML
 * - speech-elevenlabs: ElevenLabs streaming text-to-speech (synthesis only)
 * - speech-fake: deterministic in-process stand-in
 */
export interface SpeechAdapter {
  readonly providerId: ProviderId;
  readonly name: string;
  /** Audio types `recognize` can take. Others are rejected before any upstream call. */
  readonly supportedAudioTypes: ReadonlySet<AudioContentType>;

  /**
   * Transcribe audio to text.
   *
   * @throws UpstreamError subclasses for vendor failures
   */
  recognize(
    audio: AudioPayload,
    params: RecognizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<Transcript>;

  /**
   * Render text as audio.
   *
   * @throws UpstreamError subclasses for vendor failures
   */
  synthesize(
    text: string,
    params: SynthesizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<SynthesizedAudio>;

  /** Cheap reachability check, used by /readyz. */
  healthCheck(): Promise<AdapterHealthStatus>;
}
