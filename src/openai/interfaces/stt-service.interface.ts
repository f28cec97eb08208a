export interface SttSuccess {
  success: true;

  /** Trimmed, never empty */
  text: string;

  /** Language Whisper reports, or the one requested */
  language: string;

  /** 0-1, derived from segment log-probabilities */
  confidence: number;

  /** Seconds */
  duration?: number;
}

export interface SttFailure {
  success: false;
  error: string;
}

/**
 * Outcome of a transcription. Failures are values, not rejections.
 */
export type SttResult = SttSuccess | SttFailure;

export interface TranscribeOptions {
  /** ISO 639-1 hint, e.g. 'en'; defaults to STT_LANGUAGE */
  language?: string;

  /** 0 = deterministic */
  temperature?: number;
}

/**
 * Speech-to-text collaborator. Resolves a failure result instead of rejecting.
 */
export interface ISttService {
  transcribe(audio: Buffer, options?: TranscribeOptions): Promise<SttResult>;
}

export const STT_SERVICE = Symbol('STT_SERVICE');
