export * from './queue-jobs.types';
