// challenge-core: domain model, error taxonomy, wire (de)serialization and
// round selection. No HTTP here.

export * from './contracts';
export * from './errors';
export * from './case-keys';
export { decode, encode } from './serialization';
export { alwaysActiveRound, findCurrentRound, isRoundActive, MIN_TIME, MAX_TIME } from './rounds';
