/**
 * Wall-clock source for run timing; tests pass a fixed sequence.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}
