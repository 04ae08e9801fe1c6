/**
 * Time source consumed by graph nodes.
 *
 * The naming engine never reads time; nodes expose a clock next to their
 * identity so that loggers and callers share one source. Only wall-clock and
 * monotonic readings are provided here.
 *
 * @module clock/clock
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Supported clock types.
 * - 'graph': graph time, backed by the wall clock
 * - 'system': wall clock
 * - 'steady': monotonic, unrelated to wall time
 */
export const CLOCK_TYPES = ['graph', 'system', 'steady'] as const;

export type ClockType = (typeof CLOCK_TYPES)[number];

const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS_PER_MILLI = 1_000_000n;

/**
 * A point in time as integer nanoseconds.
 */
export class Time {
  readonly nanoseconds: bigint;
  readonly clockType: ClockType;

  constructor(nanoseconds: bigint, clockType: ClockType = 'system') {
    if (nanoseconds < 0n) {
      throw new RangeError(`Time must not be negative: ${nanoseconds}`);
    }
    this.nanoseconds = nanoseconds;
    this.clockType = clockType;
  }

  /** Whole seconds. */
  seconds(): bigint {
    return this.nanoseconds / NANOS_PER_SECOND;
  }

  /** Nanoseconds past the last whole second. */
  nanosecondsPart(): bigint {
    return this.nanoseconds % NANOS_PER_SECOND;
  }

  /** "seconds.nanoseconds" with the fraction padded to nine digits. */
  toString(): string {
    return `${this.seconds()}.${this.nanosecondsPart().toString().padStart(9, '0')}`;
  }
}

/**
 * Opaque time-reading provider.
 */
export interface Clock {
  readonly type: ClockType;
  now(): Time;
}

// ---------------------------------------------------------------------------
// System clock
// ---------------------------------------------------------------------------

/**
 * Clock backed by the host: `Date.now()` for 'graph' and 'system',
 * `process.hrtime.bigint()` for 'steady'.
 */
export class SystemClock implements Clock {
  readonly type: ClockType;

  constructor(type: ClockType = 'graph') {
    this.type = type;
  }

  now(): Time {
    if (this.type === 'steady') {
      return new Time(process.hrtime.bigint(), this.type);
    }
    return new Time(BigInt(Date.now()) * NANOS_PER_MILLI, this.type);
  }
}
