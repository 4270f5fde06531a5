/**
 * @speech-gateway/speech-contract — adapter interface and invocation policy.
 */

export type { SpeechAdapter, SpeechContext, AdapterHealthStatus } from "./adapter.js";
export { invoke, type InvokeOptions } from "./invoke.js";
export { withRetry, isRetryable, type RetryOptions } from "./retry.js";
export { classifyHttpFailure, classifyFetchFailure } from "./upstream-errors.js";
export { encodeWav, decodeWav, isWav, type WavInfo, type WavEncoding } from "./wav.js";
