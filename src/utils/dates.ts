/**
 * Date utilities
 * Shared time-parsing helpers for CLI commands
 */

/**
 * Parses a point in time into a Unix timestamp in **seconds**.
 *
 * Supports:
 * - Relative durations in the past: `"30m"`, `"2h"`, `"7d"`
 * - Unix timestamps in seconds: `"1718000000"`
 * - ISO 8601 dates and anything else `Date.parse()` accepts
 *
 * @throws {Error} If the string is not a valid time
 */
export function parseTimestamp(input: string, now: number = Date.now()): number {
    const relativeMatch = input.match(/^(\d+)(m|h|d)$/);
    if (relativeMatch) {
        const amount = parseInt(relativeMatch[1], 10);
        const nowSeconds = Math.floor(now / 1000);
        switch (relativeMatch[2]) {
            case 'm':
                return nowSeconds - amount * 60;
            case 'h':
                return nowSeconds - amount * 3600;
            default:
                return nowSeconds - amount * 86400;
        }
    }

    if (/^\d{9,10}$/.test(input)) {
        return parseInt(input, 10);
    }

    const ms = Date.parse(input);
    if (isNaN(ms)) {
        throw new Error(`Invalid time: "${input}". Use ISO format, unix seconds or relative (e.g., 1h, 30m, 2d)`);
    }
    return Math.floor(ms / 1000);
}
