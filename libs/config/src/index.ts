export * from './database.config';
export * from './env.validation';
export * from './race.config';
export * from './redis.config';
