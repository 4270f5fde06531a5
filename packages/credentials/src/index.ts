/**
 * @speech-gateway/credentials — credential sources and the cached, single-flight provider.
 */

export type { CredentialSource } from "./source.js";
export {
  CachedCredentialProvider,
  type CachedCredentialOptions,
  type CredentialHealth,
  type CredentialProvider,
} from "./cached-provider.js";
export {
  GoogleServiceAccountSource,
  parseServiceAccountKey,
  GOOGLE_CLOUD_SCOPE,
  type ServiceAccountKey,
  type AccessTokenClient,
  type AccessTokenClientFactory,
  type AccessTokenResult,
} from "./google-source.js";
export { AzureTokenSource, AZURE_TOKEN_TTL_MS } from "./azure-source.js";
export { StaticCredentialSource } from "./static-source.js";
