export * from './intent.interface';
