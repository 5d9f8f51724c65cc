import type { Clock } from "../types";

/**
 * Wall clock in unix seconds.
 */
export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Wraps a time source so that readings never go backwards.
 *
 * If the source steps back (NTP adjustment, a replica lagging behind), the
 * highest value already returned is repeated until the source catches up.
 */
export class MonotonicClock implements Clock {
  private last: bigint | undefined;

  /**
   * Creates a MonotonicClock.
   *
   * @param source - Underlying time source, defaults to the system clock
   */
  constructor(private readonly source: Clock = systemClock) {}

  /**
   * Reads the current time.
   *
   * @returns Unix seconds, never smaller than a previous reading
   */
  now(): bigint {
    const reading = this.source.now();
    if (this.last === undefined || reading > this.last) {
      this.last = reading;
    }
    return this.last;
  }
}
