export * from './daily-scheduler';
