/**
 * Decimal amount parsing.
 *
 * ARCHITECTURAL NOTE: Uses decimal.js so "-45.90" becomes exactly -4590
 * minor units; floats never touch an amount.
 */

import { Decimal } from 'decimal.js';
import { MONEY } from '../types/index.js';

/**
 * How a bank writes the decimal separator.
 * - point: "1,234.56" (comma groups thousands)
 * - comma: "1.234,56" or "1 234,56" (Finnish and most of Europe)
 */
export type DecimalStyle = 'point' | 'comma';

/**
 * Parse a decimal major-unit amount into integer minor units.
 *
 * @returns minor units, or null when the value is empty, not a number,
 *          or has more decimals than the currency allows
 */
export function parseAmount(value: unknown, style: DecimalStyle = 'point'): number | null {
    let decimal: Decimal;

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        decimal = new Decimal(value);
    } else if (typeof value === 'string') {
        const text = cleanAmountText(value, style);
        if (!text) return null;
        try {
            decimal = new Decimal(text);
        } catch {
            return null;
        }
    } else {
        return null;
    }

    return toMinorUnits(decimal);
}

/**
 * Major-unit Decimal to integer minor units; null if it is not a whole number of them.
 */
export function toMinorUnits(amount: Decimal): number | null {
    const minor = amount.times(MONEY.MINOR_UNITS_PER_MAJOR);
    return minor.isInteger() ? minor.toNumber() : null;
}

/**
 * Integer minor units to a major-unit string with two decimals ("-45.90").
 */
export function formatMinorUnits(amount: number): string {
    return new Decimal(amount).dividedBy(MONEY.MINOR_UNITS_PER_MAJOR).toFixed(2);
}

function cleanAmountText(value: string, style: DecimalStyle): string {
    // Spaces, non-breaking spaces and unicode minus show up in bank exports
    let text = value.trim().replace(/[\s\u00a0]/g, '').replace(/\u2212/g, '-');

    if (style === 'comma') {
        if (text.includes(',') && text.includes('.')) {
            text = text.replace(/\./g, '');
        }
        text = text.replace(',', '.');
    } else {
        text = text.replace(/,/g, '');
    }
    return text;
}
