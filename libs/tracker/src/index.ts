export * from './fix';
export * from './race';
export * from './race-state';
export * from './runner';
