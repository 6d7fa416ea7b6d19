import { describe, it, expect } from 'vitest';
import { parseAmount, formatMinorUnits } from '../../src/utils/amount.js';

describe('parseAmount', () => {
    it('parses decimal-point amounts into minor units', () => {
        expect(parseAmount('-45.90')).toBe(-4590);
        expect(parseAmount('1,234.56')).toBe(123456);
        expect(parseAmount('+7')).toBe(700);
    });

    it('parses decimal-comma amounts', () => {
        expect(parseAmount('-45,90', 'comma')).toBe(-4590);
        expect(parseAmount('1.234,56', 'comma')).toBe(123456);
        expect(parseAmount('1 234,56', 'comma')).toBe(123456);
        expect(parseAmount('1\u00a0234,56', 'comma')).toBe(123456);
    });

    it('accepts a unicode minus sign', () => {
        expect(parseAmount('\u221212.00')).toBe(-1200);
    });

    it('takes spreadsheet numbers as major units', () => {
        expect(parseAmount(12.5)).toBe(1250);
        expect(parseAmount(-0.1)).toBe(-10);
    });

    it('returns null for anything else', () => {
        expect(parseAmount('')).toBeNull();
        expect(parseAmount('abc')).toBeNull();
        expect(parseAmount('1.005')).toBeNull();
        expect(parseAmount(Number.NaN)).toBeNull();
        expect(parseAmount(null)).toBeNull();
    });
});

describe('formatMinorUnits', () => {
    it('formats with two decimals', () => {
        expect(formatMinorUnits(-4590)).toBe('-45.90');
        expect(formatMinorUnits(5)).toBe('0.05');
        expect(formatMinorUnits(0)).toBe('0.00');
    });
});
