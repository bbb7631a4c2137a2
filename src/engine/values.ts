import {Decimal} from 'decimal.js';

/**
 * Separator of the two bounds of a `between` value, e.g. `100..250` or `2024-01-01..2024-01-31`.
 */
export const RANGE_SEPARATOR = '..';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses a decimal string exactly. Returns null for anything that is not a plain finite number.
 */
export function parseDecimal(value: string): Decimal | null {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
        return null;
    }
    return new Decimal(trimmed);
}

/**
 * Canonical text form of a decimal, never in exponential notation.
 */
export function formatDecimal(value: Decimal): string {
    // decimal.js keeps the sign of zero
    return value.isZero() ? '0' : value.toFixed();
}

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})/;
const SLASH_DAY = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const DASH_DAY = /^(\d{2})-(\d{2})-(\d{4})$/;

/**
 * Parses a day in one of the formats YYYY-MM-DD (time part ignored), DD/MM/YYYY or DD-MM-YYYY.
 * Returns the day as an ISO key (YYYY-MM-DD), which orders correctly as a string.
 */
export function parseDay(value: string): string | null {
    const trimmed = value.trim();

    let match = ISO_DAY.exec(trimmed);
    if (match) {
        return dayKey(Number(match[1]), Number(match[2]), Number(match[3]));
    }
    match = SLASH_DAY.exec(trimmed) ?? DASH_DAY.exec(trimmed);
    if (match) {
        return dayKey(Number(match[3]), Number(match[2]), Number(match[1]));
    }
    return null;
}

/**
 * ISO key of the local calendar day of `date`, shifted by `offsetDays`.
 */
export function localDayKey(date: Date, offsetDays = 0): string {
    const shifted = new Date(date.getFullYear(), date.getMonth(), date.getDate() + offsetDays);
    return formatDayKey(shifted.getFullYear(), shifted.getMonth() + 1, shifted.getDate());
}

function dayKey(year: number, month: number, day: number): string | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return formatDayKey(year, month, day);
}

function formatDayKey(year: number, month: number, day: number): string {
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Splits a `between` value into its two bounds. Returns null unless there are exactly two non-empty parts.
 */
export function splitRange(value: string): [string, string] | null {
    const parts = value.split(RANGE_SEPARATOR).map(part => part.trim());
    if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
        return null;
    }
    return [parts[0], parts[1]];
}
