/**
 * @speech-gateway/validation — runtime guards for caller input.
 */

export {
  validateAudioContentType,
  validateAudioSize,
  validateText,
  validateLanguage,
  validateNumberInRange,
  validateOptionalPositiveInt,
  validateSynthesisFormat,
  validateVoiceName,
  SUPPORTED_AUDIO_TYPES,
  DEFAULT_MAX_AUDIO_BYTES,
  DEFAULT_MAX_TEXT_CHARS,
} from "./guards.js";
