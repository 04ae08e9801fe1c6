// Barrel exports for clock module

export type { ClockType, Clock } from './clock.js';
export { CLOCK_TYPES, Time, SystemClock } from './clock.js';
