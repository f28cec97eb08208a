export * from './completion.service';
export * from './speech.service';
export * from './whisper.service';
