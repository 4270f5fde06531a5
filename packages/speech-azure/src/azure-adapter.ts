/**
 * Azure Speech adapter over the REST endpoints.
 *
 * Flow:
 * - recognize: POST {region}.stt.speech.microsoft.com short-audio recognition
 *   with the audio as the raw body
 * - synthesize: POST {region}.tts.speech.microsoft.com/cognitiveservices/v1
 *   with an SSML document; output format chosen from the request's format
 *
 * The bearer credential comes from AzureTokenSource (issueToken exchange).
 */

import type {
  AudioContentType,
  AudioPayload,
  AzureSpeechConfig,
  Credential,
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
import { buildSsml } from "./ssml.js";

const VENDOR = "Azure";

const DEFAULTS: AzureSpeechConfig = {
  subscriptionKey: "",
  region: "eastus",
  voiceName: "es-CO-SalomeNeural",
};

/** X-Microsoft-OutputFormat and response MIME type per requested format. */
export const AZURE_OUTPUT_FORMATS: Readonly<
  Record<SynthesisFormat, { readonly header: string; readonly contentType: string }>
> = {
  wav: { header: "riff-16khz-16bit-mono-pcm", contentType: "audio/wav" },
  mulaw: { header: "riff-8khz-8bit-mono-mulaw", contentType: "audio/wav" },
  mp3: { header: "audio-24khz-48kbitrate-mono-mp3", contentType: "audio/mpeg" },
  ogg: { header: "ogg-24khz-16bit-mono-opus", contentType: "audio/ogg" },
};

/** Statuses that mean the audio held no usable speech. */
const NO_SPEECH_STATUSES: ReadonlySet<string> = new Set([
  "NoMatch",
  "InitialSilenceTimeout",
  "BabbleTimeout",
]);

interface AzureRecognitionResponse {
  RecognitionStatus?: string;
  DisplayText?: string;
  NBest?: Array<{ Confidence?: number; Display?: string }>;
}

export class AzureSpeechAdapter implements SpeechAdapter {
  readonly providerId: ProviderId = ProviderIds.Azure;
  readonly name = "Azure Speech";
  readonly supportedAudioTypes: ReadonlySet<AudioContentType> = new Set<AudioContentType>([
    "audio/wav",
    "audio/x-wav",
    "audio/ogg",
  ]);

  private readonly config: AzureSpeechConfig;
  private readonly log: Logger;

  constructor(config: Partial<AzureSpeechConfig>, logger: Logger) {
    this.config = { ...DEFAULTS, ...config };
    this.log = logger.child({ provider: "azure" });
  }

  async recognize(
    audio: AudioPayload,
    params: RecognizeParams,
    credential: Credential,
    ctx: SpeechContext,
  ): Promise<Transcript> {
    const startMs = Date.now();
    const log = this.log.child({ requestId: ctx.requestId });

    const contentType = this.recognitionContentType(audio);
    const url =
      `https://${this.config.region}.stt.speech.microsoft.com` +
      `/speech/recognition/conversation/cognitiveservices/v1` +
      `?language=${encodeURIComponent(params.language)}&format=detailed`;

    log.info("Starting Azure recognition", {
      contentType: audio.contentType,
      audioBytes: audio.data.length,
      language: params.language,
    });

    const response = await this.send(url, {
      method: "POST",
      headers: {
        Authorization: credential.bearer(),
        "Content-Type": contentType,
        Accept: "application/json",
      },
      body: audio.data,
      signal: ctx.signal,
    }, log);

    const data = await readJson<AzureRecognitionResponse>(response);
    const status = data.RecognitionStatus ?? "Error";

    if (NO_SPEECH_STATUSES.has(status)) {
      throw new UpstreamRejectedError(
        ErrorCodes.NO_SPEECH_RECOGNIZED,
        "No speech was recognized in the audio.",
        { detail: `Azure RecognitionStatus: ${status}` },
      );
    }
    if (status !== "Success") {
      throw new UpstreamUnavailableError(
        ErrorCodes.UPSTREAM_UNAVAILABLE,
        "The speech service could not complete recognition.",
        { detail: `Azure RecognitionStatus: ${status}` },
      );
    }

    const best = data.NBest?.[0];
    const text = (data.DisplayText ?? best?.Display ?? "").trim();
    if (text.length === 0) {
      throw new UpstreamRejectedError(
        ErrorCodes.NO_SPEECH_RECOGNIZED,
        "No speech was recognized in the audio.",
      );
    }

    const durationMs = Date.now() - startMs;
    log.info("Azure recognition complete", { durationMs, textLength: text.length });

    return {
      text,
      language: params.language,
      confidence: typeof best?.Confidence === "number" ? best.Confidence : null,
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
    const output = AZURE_OUTPUT_FORMATS[params.format];

    const ssml = buildSsml(text, {
      language: params.language,
      voice: params.voice ?? this.config.voiceName,
      rate: params.rate,
      pitch: params.pitch,
    });

    log.info("Starting Azure synthesis", {
      textLength: text.length,
      format: output.header,
    });
    log.debug("Azure SSML", { ssml });

    const response = await this.send(
      `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`,
      {
        method: "POST",
        headers: {
          Authorization: credential.bearer(),
          "Content-Type": "application/ssml+xml",
          "X-Microsoft-OutputFormat": output.header,
          "User-Agent": "speech-gateway",
        },
        body: ssml,
        signal: ctx.signal,
      },
      log,
    );

    let audio: Buffer;
    try {
      audio = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw classifyFetchFailure(VENDOR, err);
    }

    if (audio.length === 0) {
      throw new UpstreamUnavailableError(
        ErrorCodes.UPSTREAM_UNAVAILABLE,
        "The speech service returned no audio.",
        { detail: "Azure TTS response body was empty" },
      );
    }

    const durationMs = Date.now() - startMs;
    log.info("Azure synthesis complete", { durationMs, audioBytes: audio.length });

    return {
      data: audio,
      contentType: output.contentType,
      providerId: this.providerId,
      durationMs,
    };
  }

  async healthCheck(): Promise<AdapterHealthStatus> {
    const startMs = Date.now();

    if (this.config.subscriptionKey.length === 0) {
      return {
        healthy: false,
        message: "Azure subscription key not configured",
        latencyMs: 0,
      };
    }

    try {
      const response = await fetch(
        `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/voices/list`,
        {
          headers: { "Ocp-Apim-Subscription-Key": this.config.subscriptionKey },
          signal: AbortSignal.timeout(5000),
        },
      );
      return {
        healthy: response.ok,
        message: response.ok ? "Azure Speech healthy" : `HTTP ${response.status}`,
        latencyMs: Date.now() - startMs,
      };
    } catch (err) {
      return {
        healthy: false,
        message: `Azure Speech unreachable: ${err instanceof Error ? err.message : String(err)}`,
        latencyMs: Date.now() - startMs,
      };
    }
  }

  private recognitionContentType(audio: AudioPayload): string {
    switch (audio.contentType) {
      case "audio/wav":
      case "audio/x-wav":
        return `audio/wav; codecs=audio/pcm; samplerate=${audio.sampleRate ?? 16_000}`;
      case "audio/ogg":
        return "audio/ogg; codecs=opus";
      default:
        throw new UpstreamRejectedError(
          ErrorCodes.UNSUPPORTED_AUDIO_FORMAT,
          `Azure Speech does not accept ${audio.contentType} audio.`,
        );
    }
  }

  private async send(url: string, init: RequestInit, log: Logger): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      throw classifyFetchFailure(VENDOR, err);
    }

    log.debug("Azure upstream response", {
      url,
      status: response.status,
      vendorRequestId: response.headers.get("X-RequestId") ?? undefined,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw classifyHttpFailure(VENDOR, response.status, body);
    }
    return response;
  }
}

async function readJson<T>(response: Response): Promise<T> {
  try {
    return (await response.json()) as T;
  } catch (err) {
    throw classifyFetchFailure(VENDOR, err);
  }
}
