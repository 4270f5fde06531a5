/**
 * @speech-gateway/speech-google — Google Cloud Speech-to-Text / Text-to-Speech adapter.
 */

export { GoogleSpeechAdapter, percentToSemitones } from "./google-adapter.js";
