export * from './sample-flight-search.service';
