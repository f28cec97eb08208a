/**
 * Interface for text-to-speech services.
 */
export interface ITtsService {
  /**
   * Synthesize speech for a reply.
   * Resolves to base64-encoded audio, or undefined when synthesis fails, so the
   * caller can still answer with text only.
   */
  synthesizeSpeech(text: string): Promise<string | undefined>;
}

export const TTS_SERVICE = Symbol('TTS_SERVICE');
