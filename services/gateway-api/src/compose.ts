/**
 * Picks the adapter and credential source for the configured provider.
 */

import type { SpeechGatewayConfig } from "@speech-gateway/shared-types";
import { ConfigError, ErrorCodes, ProviderIds } from "@speech-gateway/shared-types";
import type { SpeechAdapter } from "@speech-gateway/speech-contract";
import { GoogleSpeechAdapter } from "@speech-gateway/speech-google";
import { AzureSpeechAdapter } from "@speech-gateway/speech-azure";
import { ElevenLabsSpeechAdapter } from "@speech-gateway/speech-elevenlabs";
import { FakeSpeechAdapter } from "@speech-gateway/speech-fake";
import {
  AzureTokenSource,
  GoogleServiceAccountSource,
  StaticCredentialSource,
  type CredentialSource,
} from "@speech-gateway/credentials";
import type { Logger } from "@speech-gateway/logging";

export interface SpeechStack {
  readonly adapter: SpeechAdapter;
  readonly source: CredentialSource;
}

export function buildSpeechStack(config: SpeechGatewayConfig, logger: Logger): SpeechStack {
  switch (config.speechProvider) {
    case ProviderIds.Google:
      return {
        adapter: new GoogleSpeechAdapter(config.google, logger),
        source: new GoogleServiceAccountSource(config.credentialsFilePath),
      };
    case ProviderIds.Azure:
      return {
        adapter: new AzureSpeechAdapter(config.azure, logger),
        source: new AzureTokenSource(config.azure.subscriptionKey, config.azure.region),
      };
    case ProviderIds.ElevenLabs:
      // The API key is the credential; it goes out in xi-api-key.
      return {
        adapter: new ElevenLabsSpeechAdapter(config.elevenlabs, logger),
        source: new StaticCredentialSource(config.elevenlabs.apiKey),
      };
    case ProviderIds.Fake:
      return {
        adapter: new FakeSpeechAdapter({}, logger),
        source: new StaticCredentialSource("fake-token"),
      };
    default:
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `No speech adapter for provider "${config.speechProvider}"`,
      );
  }
}
