export * from './scheduler.interface';
export * from './timer-queue.interface';
