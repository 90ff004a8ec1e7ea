// ---------------------------------------------------------------------------
// Injectable time source.
// ---------------------------------------------------------------------------

export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
