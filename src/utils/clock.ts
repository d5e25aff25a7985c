/**
 * Clock
 * Time source for expiry checks. Values are epoch milliseconds.
 */

export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};
