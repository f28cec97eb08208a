/**
 * A trigger time that cannot be parsed or is not strictly in the future.
 * No job is created when this is thrown.
 */
export class InvalidTimeError extends Error {
  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message);
    this.name = 'InvalidTimeError';
  }
}
