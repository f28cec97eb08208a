export * from './context-store.interface';
export * from './job-store.interface';
