export * from './ping.entity';
export * from './race-state.entity';
