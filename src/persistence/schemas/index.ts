export * from './job.schema';
export * from './user-record.schema';
