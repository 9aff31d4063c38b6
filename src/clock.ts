/**
 * Source of the current chain timestamp, in seconds
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};
