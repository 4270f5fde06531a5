/**
 * Deterministic in-process speech adapter.
 *
 * synthesize(text) returns the UTF-8 text inside a WAV container;
 * recognize(audio) unwraps it again. Latency and failures can be injected
 * so the gateway's timeout, cancellation and error paths are testable
 * without a vendor.
 */

import type {
  AudioContentType,
  AudioPayload,
  Credential,
  ProviderId,
  RecognizeParams,
  SynthesizeParams,
  SynthesizedAudio,
  Transcript,
  UpstreamError,
} from "@speech-gateway/shared-types";
import {
  ErrorCodes,
  ProviderIds,
  UpstreamRejectedError,
  UpstreamTimeoutError,
} from "@speech-gateway/shared-types";
import {
  decodeWav,
  encodeWav,
  type AdapterHealthStatus,
  type SpeechAdapter,
  type SpeechContext,
} from "@speech-gateway/speech-contract";
import type { Logger } from "@speech-gateway/logging";

export interface FakeSpeechOptions {
  /** Delay before each call completes. */
  readonly latencyMs: number;
  /** When false, the adapter keeps waiting after its signal aborts. */
  readonly honourSignal: boolean;
  /** Thrown by every call while set. */
  readonly failure: UpstreamError | undefined;
  readonly sampleRate: number;
}

const DEFAULTS: FakeSpeechOptions = {
  latencyMs: 0,
  honourSignal: true,
  failure: undefined,
  sampleRate: 16_000,
};

export class FakeSpeechAdapter implements SpeechAdapter {
  readonly providerId: ProviderId = ProviderIds.Fake;
  readonly name = "Fake Speech";
  readonly supportedAudioTypes: ReadonlySet<AudioContentType> = new Set<AudioContentType>([
    "audio/wav",
    "audio/x-wav",
    "audio/pcm",
  ]);

  /** Number of calls received, by operation. */
  readonly calls = { recognize: 0, synthesize: 0 };

  private options: FakeSpeechOptions;
  private readonly log: Logger;

  constructor(options: Partial<FakeSpeechOptions>, logger: Logger) {
    this.options = { ...DEFAULTS, ...options };
    this.log = logger.child({ provider: "fake" });
  }

  /** Change injected behaviour between calls. */
  configure(options: Partial<FakeSpeechOptions>): void {
    this.options = { ...this.options, ...options };
  }

  async recognize(
    audio: AudioPayload,
    params: RecognizeParams,
    _credential: Credential,
    ctx: SpeechContext,
  ): Promise<Transcript> {
    const startMs = Date.now();
    this.calls.recognize++;
    await this.simulate(ctx);

    let payload: Buffer;
    if (audio.contentType === "audio/pcm") {
      payload = audio.data;
    } else {
      const wav = decodeWav(audio.data);
      if (!wav) {
        throw new UpstreamRejectedError(
          ErrorCodes.UPSTREAM_REJECTED,
          "The speech service could not decode the audio.",
          { detail: "Payload is not a RIFF/WAVE container" },
        );
      }
      payload = wav.data;
    }

    const text = payload.toString("utf8").trim();
    if (text.length === 0) {
      throw new UpstreamRejectedError(
        ErrorCodes.NO_SPEECH_RECOGNIZED,
        "No speech was recognized in the audio.",
      );
    }

    this.log.debug("Fake recognition", { requestId: ctx.requestId, bytes: audio.data.length });

    return {
      text,
      language: params.language,
      confidence: 1,
      providerId: this.providerId,
      durationMs: Date.now() - startMs,
    };
  }

  async synthesize(
    text: string,
    _params: SynthesizeParams,
    _credential: Credential,
    ctx: SpeechContext,
  ): Promise<SynthesizedAudio> {
    const startMs = Date.now();
    this.calls.synthesize++;
    await this.simulate(ctx);

    const data = encodeWav(Buffer.from(text, "utf8"), this.options.sampleRate);
    this.log.debug("Fake synthesis", { requestId: ctx.requestId, bytes: data.length });

    // Always a WAV container, whatever format was asked for.
    return {
      data,
      contentType: "audio/wav",
      providerId: this.providerId,
      durationMs: Date.now() - startMs,
    };
  }

  async healthCheck(): Promise<AdapterHealthStatus> {
    return { healthy: true, message: "Fake adapter ready", latencyMs: 0 };
  }

  private async simulate(ctx: SpeechContext): Promise<void> {
    if (this.options.latencyMs > 0) {
      await delay(this.options.latencyMs, this.options.honourSignal ? ctx.signal : undefined);
    }
    if (this.options.failure) throw this.options.failure;
  }
}

function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const aborted = (): UpstreamTimeoutError =>
      new UpstreamTimeoutError(ErrorCodes.UPSTREAM_TIMEOUT, "The speech service call was aborted.");
    if (signal?.aborted) {
      reject(aborted());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(aborted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
