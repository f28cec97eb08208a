export * from './invalid-time.error';
export * from './timeout.error';
export * from './transcription.error';
