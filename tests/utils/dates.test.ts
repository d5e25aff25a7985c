/**
 * Tests for date parsing
 */
import { describe, it, expect } from 'vitest';
import { parseTimestamp } from '../../src/utils/dates.js';

const NOW = 1_700_000_000_000;

describe('parseTimestamp', () => {
    it('should parse relative minutes, hours and days into the past', () => {
        expect(parseTimestamp('30m', NOW)).toBe(1_700_000_000 - 1800);
        expect(parseTimestamp('2h', NOW)).toBe(1_700_000_000 - 7200);
        expect(parseTimestamp('1d', NOW)).toBe(1_700_000_000 - 86_400);
    });

    it('should pass Unix seconds through', () => {
        expect(parseTimestamp('1699990000', NOW)).toBe(1_699_990_000);
    });

    it('should parse ISO dates', () => {
        expect(parseTimestamp('2023-11-14T22:13:20Z', NOW)).toBe(1_700_000_000);
    });

    it('should reject anything else', () => {
        expect(() => parseTimestamp('yesterday', NOW)).toThrow(
            'Invalid time: "yesterday". Use ISO format, unix seconds or relative (e.g., 1h, 30m, 2d)',
        );
    });
});
