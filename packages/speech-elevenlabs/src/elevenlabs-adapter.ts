/**
 * ElevenLabs adapter. Synthesis only: ElevenLabs has no recognition
 * endpoint here, so `supportedAudioTypes` is empty and `recognize` refuses.
 *
 * Flow:
 * - synthesize: POST /v1/text-to-speech/{voiceId}/stream?output_format=...
 *   with the key in `xi-api-key`; raw μ-law or PCM is wrapped in a WAV
 *   header, MP3 is passed through
 *
 * The credential is the API key itself, issued by a StaticCredentialSource.
 */

import type {
  AudioContentType,
  AudioPayload,
  Credential,
  ElevenLabsOutputFormat,
  ElevenLabsSpeechConfig,
  ProviderId,
  RecognizeParams,
  SynthesisFormat,
  SynthesizeParams,
  SynthesizedAudio,
  Transcript,
} from "@speech-gateway/shared-types";
import {
  ErrorCodes,
  ProviderIds,
  UpstreamRejectedError,
  UpstreamUnavailableError,
} from "@speech-gateway/shared-types";
import {
  classifyFetchFailure,
  classifyHttpFailure,
  encodeWav,
  isWav,
  type AdapterHealthStatus,
  type SpeechAdapter,
  type SpeechContext,
  type WavEncoding,
} from "@speech-gateway/speech-contract";
import type { Logger } from "@speech-gateway/logging";

const VENDOR = "ElevenLabs";

export const ELEVENLABS_API_BASE = "https://api.elevenlabs.io/v1";

const DEFAULTS: ElevenLabsSpeechConfig = {
  apiKey: "",
  voiceId: "",
  modelId: "eleven_multilingual_v2",
  outputFormat: "ulaw_8000",
};

/** Tuned for a warm, slightly brisk conversational read. */
export const VOICE_SETTINGS = {
  stability: 0.35,
  similarity_boost: 0.92,
  style: 0.8,
  use_speaker_boost: true,
} as const;

/** ElevenLabs accepts speed between 0.7 and 1.2. */
const SPEED_RANGE = { min: 0.7, max: 1.2 } as const;

interface OutputPlan {
  /** `output_format` query value. */
  readonly vendorFormat: string;
  readonly contentType: string;
  /** Header to wrap raw samples in; undefined passes the body through. */
  readonly wrap?: { readonly encoding: WavEncoding; readonly sampleRate: number };
}

const RAW_OUTPUTS: Readonly<Record<ElevenLabsOutputFormat, OutputPlan>> = {
  ulaw_8000: {
    vendorFormat: "ulaw_8000",
    contentType: "audio/wav",
    wrap: { encoding: "mulaw", sampleRate: 8_000 },
  },
  pcm_16000: {
    vendorFormat: "pcm_16000",
    contentType: "audio/wav",
    wrap: { encoding: "pcm16", sampleRate: 16_000 },
  },
};

/** Map the gateway's speaking-rate multiplier onto the vendor's speed range. */
export function speedFor(rate: number): number {
  return Math.min(SPEED_RANGE.max, Math.max(SPEED_RANGE.min, rate));
}

export class ElevenLabsSpeechAdapter implements SpeechAdapter {
  readonly providerId: ProviderId = ProviderIds.ElevenLabs;
  readonly name = "ElevenLabs";
  readonly supportedAudioTypes: ReadonlySet<AudioContentType> = new Set<AudioContentType>();

  private readonly config: ElevenLabsSpeechConfig;
  private readonly log: Logger;

  constructor(config: Partial<ElevenLabsSpeechConfig>, logger: Logger) {
    this.config = { ...DEFAULTS, ...config };
    this.log = logger.child({ provider: "elevenlabs" });
  }

  async recognize(
    _audio: AudioPayload,
    _params: RecognizeParams,
    _credential: Credential,
    _ctx: SpeechContext,
  ): Promise<Transcript> {
    throw new UpstreamRejectedError(
      ErrorCodes.UNSUPPORTED_OPERATION,
      "The active speech provider does not support recognition.",
      { detail: "ElevenLabs adapter is synthesis-only" },
    );
  }

  async synthesize(
    text: string,
    params: SynthesizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<SynthesizedAudio> {
    const startMs = Date.now();
    const log = this.log.child({ requestId: ctx.requestId });
    const plan = this.planOutput(params.format);
    const voiceId = params.voice ?? this.config.voiceId;

    const url =
      `${ELEVENLABS_API_BASE}/text-to-speech/${encodeURIComponent(voiceId)}/stream` +
      `?output_format=${plan.vendorFormat}`;

    log.info("Starting ElevenLabs synthesis", {
      textLength: text.length,
      voiceId,
      model: this.config.modelId,
      format: plan.vendorFormat,
    });
    if (params.pitch !== 0) {
      log.debug("Pitch is not adjustable on ElevenLabs; ignoring", { pitch: params.pitch });
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          "xi-api-key": credential.secret(),
          "Content-Type": "application/json",
          Accept: "application/octet-stream",
        },
        body: JSON.stringify({
          text,
          model_id: this.config.modelId,
          voice_settings: { ...VOICE_SETTINGS, speed: speedFor(params.rate) },
        }),
        signal: ctx.signal,
      });
    } catch (err) {
      throw classifyFetchFailure(VENDOR, err);
    }

    log.debug("ElevenLabs upstream response", {
      status: response.status,
      vendorRequestId: response.headers.get("request-id") ?? undefined,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw classifyHttpFailure(VENDOR, response.status, body);
    }

    let raw: Buffer;
    try {
      raw = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw classifyFetchFailure(VENDOR, err);
    }

    if (raw.length === 0) {
      throw new UpstreamUnavailableError(
        ErrorCodes.UPSTREAM_UNAVAILABLE,
        "The speech service returned no audio.",
        { detail: "ElevenLabs TTS response body was empty" },
      );
    }

    // Some formats come back already containerized.
    const data =
      plan.wrap === undefined || isWav(raw)
        ? raw
        : encodeWav(raw, plan.wrap.sampleRate, plan.wrap.encoding);

    const durationMs = Date.now() - startMs;
    log.info("ElevenLabs synthesis complete", { durationMs, audioBytes: data.length });

    return {
      data,
      contentType: plan.contentType,
      providerId: this.providerId,
      durationMs,
    };
  }

  async healthCheck(): Promise<AdapterHealthStatus> {
    const startMs = Date.now();

    if (this.config.apiKey.length === 0) {
      return { healthy: false, message: "ElevenLabs API key not configured", latencyMs: 0 };
    }

    try {
      const response = await fetch(`${ELEVENLABS_API_BASE}/user`, {
        headers: { "xi-api-key": this.config.apiKey },
        signal: AbortSignal.timeout(5000),
      });
      return {
        healthy: response.ok,
        message: response.ok ? "ElevenLabs healthy" : `HTTP ${response.status}`,
        latencyMs: Date.now() - startMs,
      };
    } catch (err) {
      return {
        healthy: false,
        message: `ElevenLabs unreachable: ${err instanceof Error ? err.message : String(err)}`,
        latencyMs: Date.now() - startMs,
      };
    }
  }

  private planOutput(format: SynthesisFormat): OutputPlan {
    switch (format) {
      case "wav":
        return RAW_OUTPUTS[this.config.outputFormat];
      case "mulaw":
        return RAW_OUTPUTS.ulaw_8000;
      case "mp3":
        return { vendorFormat: "mp3_44100_128", contentType: "audio/mpeg" };
      case "ogg":
        throw new UpstreamRejectedError(
          ErrorCodes.UPSTREAM_REJECTED,
          "The speech service cannot produce ogg audio.",
          { detail: "ElevenLabs has no ogg output format" },
        );
    }
  }
}
