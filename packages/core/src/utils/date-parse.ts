/**
 * Date parsing utilities for transaction parsers.
 * All dates returned as UTC (00:00:00Z).
 */

export type DateFormat = 'DMY' | 'ISO';

/**
 * Parse date value (Excel serial, Date object, or string).
 * Returns date in UTC (00:00:00Z).
 */
export function parseDateValue(value: unknown, format: DateFormat): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) ? value : null;
    }
    if (typeof value === 'number') {
        // Excel serial date
        return excelSerialToDate(value);
    }

    if (typeof value === 'string') {
        return format === 'DMY' ? parseDmyDate(value.trim()) : parseIsoDate(value.trim());
    }

    return null;
}

/**
 * Parse DD.MM.YYYY date string to Date (UTC). Day and month may be one digit.
 */
export function parseDmyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/);
    if (!match) return null;

    return utcDate(parseInt(match[3], 10), parseInt(match[2], 10), parseInt(match[1], 10));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    return utcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30. Fractions (time of day) are rounded away.
    const days = Math.round(serial);
    const utcDays = days - 25569;
    return new Date(utcDays * 86400 * 1000);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

// Rejects rollovers such as 31.02.2026
function utcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}
