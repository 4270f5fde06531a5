/**
 * Google Cloud speech adapter.
 *
 * Flow:
 * - recognize: POST speech.googleapis.com/v1/speech:recognize with base64 audio
 * - synthesize: POST texttospeech.googleapis.com/v1/text:synthesize
 *
 * Both calls carry the service-account access token as a bearer credential.
 */

import type {
  AudioContentType,
  AudioPayload,
  Credential,
  GoogleSpeechConfig,
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
  type AdapterHealthStatus,
  type SpeechAdapter,
  type SpeechContext,
} from "@speech-gateway/speech-contract";
import type { Logger } from "@speech-gateway/logging";

const STT_ENDPOINT = "https://speech.googleapis.com/v1/speech:recognize";
const TTS_ENDPOINT = "https://texttospeech.googleapis.com/v1/text:synthesize";
const TTS_DISCOVERY = "https://texttospeech.googleapis.com/$discovery/rest?version=v1";

const VENDOR = "Google";

const DEFAULTS: GoogleSpeechConfig = {
  voiceName: undefined,
};

/** Google's pitch bound, in semitones. */
const MAX_PITCH_SEMITONES = 20;

interface RecognitionConfig {
  encoding?: string;
  sampleRateHertz?: number;
  languageCode: string;
  enableAutomaticPunctuation: boolean;
}

interface EncodingSpec {
  readonly encoding?: string;
  readonly defaultSampleRate?: number;
}

/** WAV and FLAC carry their own header; Google reads encoding and rate from it. */
const RECOGNITION_ENCODINGS: Readonly<Partial<Record<AudioContentType, EncodingSpec>>> = {
  "audio/wav": {},
  "audio/x-wav": {},
  "audio/flac": { encoding: "FLAC" },
  "audio/pcm": { encoding: "LINEAR16", defaultSampleRate: 16_000 },
  "audio/ogg": { encoding: "OGG_OPUS", defaultSampleRate: 48_000 },
  "audio/webm": { encoding: "WEBM_OPUS", defaultSampleRate: 48_000 },
};

const SYNTHESIS_ENCODINGS: Readonly<
  Record<SynthesisFormat, { audioEncoding: string; contentType: string; sampleRateHertz?: number }>
> = {
  wav: { audioEncoding: "LINEAR16", contentType: "audio/wav" },
  mulaw: { audioEncoding: "MULAW", contentType: "audio/wav", sampleRateHertz: 8_000 },
  mp3: { audioEncoding: "MP3", contentType: "audio/mpeg" },
  ogg: { audioEncoding: "OGG_OPUS", contentType: "audio/ogg" },
};

interface GoogleAlternative {
  transcript?: string;
  confidence?: number;
}

interface GoogleRecognizeResponse {
  results?: Array<{
    alternatives?: GoogleAlternative[];
    languageCode?: string;
  }>;
}

interface GoogleSynthesizeResponse {
  audioContent?: string;
}

/** Convert a percent pitch shift to Google's semitone scale. */
export function percentToSemitones(percent: number): number {
  const semitones = 12 * Math.log2(1 + percent / 100);
  const clamped = Math.max(-MAX_PITCH_SEMITONES, Math.min(MAX_PITCH_SEMITONES, semitones));
  return Math.round(clamped * 100) / 100;
}

export class GoogleSpeechAdapter implements SpeechAdapter {
  readonly providerId: ProviderId = ProviderIds.Google;
  readonly name = "Google Cloud Speech";
  readonly supportedAudioTypes: ReadonlySet<AudioContentType> = new Set<AudioContentType>([
    "audio/wav",
    "audio/x-wav",
    "audio/flac",
    "audio/pcm",
    "audio/ogg",
    "audio/webm",
  ]);

  private readonly config: GoogleSpeechConfig;
  private readonly log: Logger;

  constructor(config: Partial<GoogleSpeechConfig>, logger: Logger) {
    this.config = { ...DEFAULTS, ...config };
    this.log = logger.child({ provider: "google" });
  }

  async recognize(
    audio: AudioPayload,
    params: RecognizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<Transcript> {
    const startMs = Date.now();
    const log = this.log.child({ requestId: ctx.requestId });

    const encodingSpec = RECOGNITION_ENCODINGS[audio.contentType];
    if (!encodingSpec) {
      throw new UpstreamRejectedError(
        ErrorCodes.UNSUPPORTED_AUDIO_FORMAT,
        `Google Speech does not accept ${audio.contentType} audio.`,
      );
    }

    const config: RecognitionConfig = {
      languageCode: params.language,
      enableAutomaticPunctuation: true,
    };
    if (encodingSpec.encoding) config.encoding = encodingSpec.encoding;
    const sampleRate = audio.sampleRate ?? encodingSpec.defaultSampleRate;
    if (sampleRate !== undefined) config.sampleRateHertz = sampleRate;

    log.info("Starting Google recognition", {
      contentType: audio.contentType,
      audioBytes: audio.data.length,
      language: params.language,
    });

    const data = await this.post<GoogleRecognizeResponse>(
      STT_ENDPOINT,
      { config, audio: { content: audio.data.toString("base64") } },
      credential,
      ctx,
      log,
    );

    const best = (data.results ?? [])
      .map((r) => r.alternatives?.[0])
      .filter((alt): alt is GoogleAlternative => alt !== undefined);
    const text = best
      .map((alt) => alt.transcript?.trim() ?? "")
      .filter((t) => t.length > 0)
      .join(" ");

    if (text.length === 0) {
      throw new UpstreamRejectedError(
        ErrorCodes.NO_SPEECH_RECOGNIZED,
        "No speech was recognized in the audio.",
      );
    }

    const confidences = best
      .map((alt) => alt.confidence)
      .filter((c): c is number => typeof c === "number");
    const confidence =
      confidences.length > 0
        ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length
        : null;

    const durationMs = Date.now() - startMs;
    log.info("Google recognition complete", { durationMs, textLength: text.length });

    return {
      text,
      language: data.results?.[0]?.languageCode ?? params.language,
      confidence,
      providerId: this.providerId,
      durationMs,
    };
  }

  async synthesize(
    text: string,
    params: SynthesizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<SynthesizedAudio> {
    const startMs = Date.now();
    const log = this.log.child({ requestId: ctx.requestId });
    const output = SYNTHESIS_ENCODINGS[params.format];
    const voiceName = params.voice ?? this.config.voiceName;

    log.info("Starting Google synthesis", {
      textLength: text.length,
      language: params.language,
      format: params.format,
    });

    const data = await this.post<GoogleSynthesizeResponse>(
      TTS_ENDPOINT,
      {
        input: { text },
        voice: {
          languageCode: params.language,
          ...(voiceName !== undefined ? { name: voiceName } : {}),
        },
        audioConfig: {
          audioEncoding: output.audioEncoding,
          speakingRate: params.rate,
          pitch: percentToSemitones(params.pitch),
          ...(output.sampleRateHertz !== undefined
            ? { sampleRateHertz: output.sampleRateHertz }
            : {}),
        },
      },
      credential,
      ctx,
      log,
    );

    if (!data.audioContent) {
      throw new UpstreamUnavailableError(
        ErrorCodes.UPSTREAM_UNAVAILABLE,
        "The speech service returned no audio.",
        { detail: "Google text:synthesize response had no audioContent" },
      );
    }

    const audio = Buffer.from(data.audioContent, "base64");
    const durationMs = Date.now() - startMs;
    log.info("Google synthesis complete", { durationMs, audioBytes: audio.length });

    return {
      data: audio,
      contentType: output.contentType,
      providerId: this.providerId,
      durationMs,
    };
  }

  async healthCheck(): Promise<AdapterHealthStatus> {
    const startMs = Date.now();
    try {
      const response = await fetch(TTS_DISCOVERY, { signal: AbortSignal.timeout(5000) });
      return {
        healthy: response.ok,
        message: response.ok ? "Google Speech reachable" : `HTTP ${response.status}`,
        latencyMs: Date.now() - startMs,
      };
    } catch (err) {
      return {
        healthy: false,
        message: `Google Speech unreachable: ${err instanceof Error ? err.message : String(err)}`,
        latencyMs: Date.now() - startMs,
      };
    }
  }

  private async post<T>(
    url: string,
    body: unknown,
    credential: Credential,
    ctx: SpeechContext,
    log: Logger,
  ): Promise<T> {
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: credential.bearer(),
          "Content-Type": "application/json; charset=utf-8",
        },
        body: JSON.stringify(body),
        signal: ctx.signal,
      });

      log.debug("Google upstream response", { url, status: response.status });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw classifyHttpFailure(VENDOR, response.status, text);
      }

      return (await response.json()) as T;
    } catch (err) {
      throw classifyFetchFailure(VENDOR, err);
    }
  }
}
