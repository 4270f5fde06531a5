/**
 * Runtime configuration types.
 */

import type { ProviderId } from "./branded.js";

/** Speech gateway configuration. Built once at startup, frozen thereafter. */
export interface SpeechGatewayConfig {
  /** Path to the vendor credentials file (service-account JSON). */
  readonly credentialsFilePath: string;
  /** Verbose upstream diagnostics (debug-level logging). */
  readonly loggingEnabled: boolean;
  /** HTTP listen port. */
  readonly listenPort: number;
  /** HTTP listen host. */
  readonly host: string;
  /** Active speech adapter. */
  readonly speechProvider: ProviderId;
  /** Default BCP-47 language when a request names none. */
  readonly defaultLanguage: string;
  /** Allowed CORS origins; empty allows all. */
  readonly corsOrigins: readonly string[];
  readonly upstream: UpstreamConfig;
  readonly limits: LimitsConfig;
  readonly google: GoogleSpeechConfig;
  readonly azure: AzureSpeechConfig;
  readonly elevenlabs: ElevenLabsSpeechConfig;
}

export interface UpstreamConfig {
  /** Bound on each vendor call. */
  readonly timeoutMs: number;
  /** Bound on each credential refresh. */
  readonly credentialTimeoutMs: number;
  /** Extra attempts on unavailable/timeout failures. 0 = single attempt. */
  readonly maxRetries: number;
}

export interface LimitsConfig {
  readonly maxAudioBytes: number;
  readonly maxTextChars: number;
}

export interface GoogleSpeechConfig {
  /** Text-to-Speech voice name; vendor picks by language when undefined. */
  readonly voiceName: string | undefined;
}

export interface AzureSpeechConfig {
  readonly subscriptionKey: string;
  readonly region: string;
  readonly voiceName: string;
}

/** ElevenLabs output formats the adapter knows how to package. */
export type ElevenLabsOutputFormat = "ulaw_8000" | "pcm_16000";

export interface ElevenLabsSpeechConfig {
  readonly apiKey: string;
  readonly voiceId: string;
  readonly modelId: string;
  /** Format used for `wav` requests. */
  readonly outputFormat: ElevenLabsOutputFormat;
}
