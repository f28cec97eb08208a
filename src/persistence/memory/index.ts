export * from './in-memory-context.store';
export * from './in-memory-job.store';
