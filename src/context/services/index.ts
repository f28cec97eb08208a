export * from './context-listener.service';
export * from './context.service';
