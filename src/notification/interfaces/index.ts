export * from './job-payload.schema';
export * from './push-delivery.interface';
