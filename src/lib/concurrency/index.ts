export * from './concurrency-limiter';
