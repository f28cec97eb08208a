export * from './file-context.store';
export * from './file-job.store';
