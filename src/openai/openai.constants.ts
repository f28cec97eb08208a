/**
 * Injection token for OpenAI client.
 */
export const OPENAI_CLIENT = Symbol('OPENAI_CLIENT');

/**
 * Model names used when configuration does not override them.
 */
export const MODELS = {
  /** Chat model for classification and phrasing */
  CHAT: 'gpt-4o-mini',

  /** Speech-to-text model */
  WHISPER: 'whisper-1',

  /** Text-to-speech model */
  TTS: 'tts-1',
} as const;

/**
 * Voices accepted by the speech endpoint.
 */
export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

/** Upper bound for any single OpenAI call when configuration is silent */
export const DEFAULT_TIMEOUT_MS = 15_000;
