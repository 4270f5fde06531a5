/**
 * @speech-gateway/speech-azure — Azure Speech REST adapter with SSML synthesis.
 */

export { AzureSpeechAdapter, AZURE_OUTPUT_FORMATS } from "./azure-adapter.js";
export { buildSsml, cleanText, escapeXml, formatPitch, type SsmlOptions } from "./ssml.js";
