/**
 * Audio could not be turned into text (malformed, unsupported or silent input).
 */
export class TranscriptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptionError';
  }
}
