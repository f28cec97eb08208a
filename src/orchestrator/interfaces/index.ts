export * from './conversation.interface';
