export * from './normalizer';
