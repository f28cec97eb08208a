export * from './completion-service.interface';
export * from './stt-service.interface';
export * from './tts-service.interface';
