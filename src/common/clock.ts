export interface Clock {
  /** Milliseconds since epoch */
  now: () => number;
  utcNow: () => Date;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
};
