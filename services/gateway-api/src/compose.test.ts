import { describe, it, expect } from "vitest";
import { buildSpeechStack } from "./compose.js";
import { Logger } from "@speech-gateway/logging";
import {
  ProviderIds,
  createProviderId,
  type SpeechGatewayConfig,
} from "@speech-gateway/shared-types";
import { GoogleSpeechAdapter } from "@speech-gateway/speech-google";
import { AzureSpeechAdapter } from "@speech-gateway/speech-azure";
import { ElevenLabsSpeechAdapter } from "@speech-gateway/speech-elevenlabs";
import { FakeSpeechAdapter } from "@speech-gateway/speech-fake";
import {
  AzureTokenSource,
  GoogleServiceAccountSource,
  StaticCredentialSource,
} from "@speech-gateway/credentials";

const logger = new Logger();

function makeConfig(overrides: Partial<SpeechGatewayConfig> = {}): SpeechGatewayConfig {
  return {
    credentialsFilePath: "/etc/speech/service-account.json",
    loggingEnabled: false,
    listenPort: 8080,
    host: "127.0.0.1",
    speechProvider: ProviderIds.Google,
    defaultLanguage: "es-CO",
    corsOrigins: [],
    upstream: { timeoutMs: 15_000, credentialTimeoutMs: 10_000, maxRetries: 0 },
    limits: { maxAudioBytes: 1024, maxTextChars: 100 },
    google: { voiceName: undefined },
    azure: { subscriptionKey: "test-key", region: "westeurope", voiceName: "es-CO-SalomeNeural" },
    elevenlabs: {
      apiKey: "test-api-key",
      voiceId: "voice-123",
      modelId: "eleven_multilingual_v2",
      outputFormat: "ulaw_8000",
    },
    ...overrides,
  };
}

describe("buildSpeechStack", () => {
  it("pairs Google with the service-account source", () => {
    const { adapter, source } = buildSpeechStack(makeConfig(), logger);

    expect(adapter).toBeInstanceOf(GoogleSpeechAdapter);
    expect(source).toBeInstanceOf(GoogleServiceAccountSource);
  });

  it("pairs Azure with the token source", () => {
    const { adapter, source } = buildSpeechStack(makeConfig({ speechProvider: ProviderIds.Azure }), logger);

    expect(adapter).toBeInstanceOf(AzureSpeechAdapter);
    expect(source).toBeInstanceOf(AzureTokenSource);
  });

  it("pairs ElevenLabs with its API key as a static credential", async () => {
    const { adapter, source } = buildSpeechStack(
      makeConfig({ speechProvider: ProviderIds.ElevenLabs }),
      logger,
    );

    expect(adapter).toBeInstanceOf(ElevenLabsSpeechAdapter);
    expect(source).toBeInstanceOf(StaticCredentialSource);
    expect((await source.fetchCredential(new AbortController().signal)).secret()).toBe("test-api-key");
  });

  it("pairs the fake adapter with a static token", () => {
    const { adapter, source } = buildSpeechStack(makeConfig({ speechProvider: createProviderId("fake") }), logger);

    expect(adapter).toBeInstanceOf(FakeSpeechAdapter);
    expect(source).toBeInstanceOf(StaticCredentialSource);
  });
});
