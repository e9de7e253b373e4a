export * from './constants';
export * from './date.util';
export * from './engine-logger';
export * from './format.util';
export * from './guards';
