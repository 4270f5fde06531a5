/**
 * @speech-gateway/shared-types — canonical domain types for the speech gateway.
 */

export {
  type Brand,
  type RequestId,
  type ProviderId,
  createRequestId,
  createProviderId,
  ProviderIds,
} from "./branded.js";

export {
  GatewayError,
  ConfigError,
  CredentialError,
  ValidationError,
  UpstreamError,
  UpstreamUnavailableError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
  RequestCancelledError,
  InternalError,
  ErrorCodes,
  HTTP_STATUS_BY_KIND,
  toGatewayError,
  type ErrorCode,
  type ErrorKind,
  type UpstreamErrorKind,
  type GatewayErrorOptions,
  type ErrorResponseBody,
} from "./errors.js";

export { Credential } from "./credential.js";

export type {
  AudioContentType,
  SynthesisFormat,
  SpeechOperation,
  AudioPayload,
  RecognizeParams,
  SynthesizeParams,
  RecognizeRequest,
  SynthesizeRequest,
  SpeechRequest,
  Transcript,
  SynthesizedAudio,
  SpeechResult,
} from "./speech.js";

export type {
  SpeechGatewayConfig,
  UpstreamConfig,
  LimitsConfig,
  GoogleSpeechConfig,
  AzureSpeechConfig,
  ElevenLabsSpeechConfig,
  ElevenLabsOutputFormat,
} from "./config.js";
