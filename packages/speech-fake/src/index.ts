/**
 * @speech-gateway/speech-fake — deterministic in-process speech adapter.
 */

export { FakeSpeechAdapter, type FakeSpeechOptions } from "./fake-adapter.js";
export { encodeWav, decodeWav, type WavInfo } from "@speech-gateway/speech-contract";
