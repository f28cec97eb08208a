export * from './flight-summary';
export * from './intent-classification';
