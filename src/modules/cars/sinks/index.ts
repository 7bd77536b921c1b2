export * from './sink.types';
export * from './json-file.sink';
export * from './store.sink';
