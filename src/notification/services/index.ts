export * from './device.service';
export * from './job-dispatcher.service';
export * from './reminder.service';
