export * from './user-context.interface';
