/**
 * @speech-gateway/speech-elevenlabs — ElevenLabs streaming text-to-speech adapter.
 */

export {
  ElevenLabsSpeechAdapter,
  ELEVENLABS_API_BASE,
  VOICE_SETTINGS,
  speedFor,
} from "./elevenlabs-adapter.js";
