import type { Credential } from "@speech-gateway/shared-types";

/**
 * Where credentials come from. A source mints a fresh credential on every
 * call; caching and refresh policy live in CachedCredentialProvider.
 */
export interface CredentialSource {
  /** Short label for logs, e.g. "google-service-account". */
  readonly name: string;
  /** Mint a credential. `signal` aborts when the refresh times out. */
  fetchCredential(signal: AbortSignal): Promise<Credential>;
}
