export * from './flight.interface';
