import {Decimal} from 'decimal.js';
import {formatDecimal, localDayKey, parseDay, parseDecimal, splitRange} from './values';

describe('values', () => {
    describe('parseDecimal', () => {
        it('should parse plain decimals exactly', () => {
            expect(parseDecimal('-1500.00')?.toFixed()).toBe('-1500');
            expect(parseDecimal(' 0.1 ')?.plus('0.2').toFixed()).toBe('0.3');
            expect(parseDecimal('.5')?.toFixed()).toBe('0.5');
        });

        it('should reject anything that is not a plain number', () => {
            expect(parseDecimal('')).toBeNull();
            expect(parseDecimal('abc')).toBeNull();
            expect(parseDecimal('1e5')).toBeNull();
            expect(parseDecimal('1,50')).toBeNull();
            expect(parseDecimal('Infinity')).toBeNull();
        });
    });

    describe('formatDecimal', () => {
        it('should never use exponential notation or a negative zero', () => {
            expect(formatDecimal(new Decimal('1e21'))).toBe('1000000000000000000000');
            expect(formatDecimal(new Decimal(0).negated())).toBe('0');
            expect(formatDecimal(new Decimal('-12.30'))).toBe('-12.3');
        });
    });

    describe('parseDay', () => {
        it('should accept the supported formats', () => {
            expect(parseDay('2024-02-29')).toBe('2024-02-29');
            expect(parseDay('2024-02-29T13:45:00Z')).toBe('2024-02-29');
            expect(parseDay('31/12/2025')).toBe('2025-12-31');
            expect(parseDay('01-06-2024')).toBe('2024-06-01');
        });

        it('should reject impossible or unknown dates', () => {
            expect(parseDay('2023-02-29')).toBeNull();
            expect(parseDay('32/01/2024')).toBeNull();
            expect(parseDay('yesterday')).toBeNull();
            expect(parseDay('')).toBeNull();
        });
    });

    describe('localDayKey', () => {
        it('should shift across month and year ends', () => {
            const newYearsEve = new Date(2024, 11, 31, 12, 0, 0);
            expect(localDayKey(newYearsEve)).toBe('2024-12-31');
            expect(localDayKey(newYearsEve, 1)).toBe('2025-01-01');
            expect(localDayKey(new Date(2024, 2, 1, 8), -1)).toBe('2024-02-29');
        });
    });

    describe('splitRange', () => {
        it('should split on the range separator', () => {
            expect(splitRange('100..250')).toEqual(['100', '250']);
            expect(splitRange(' 2024-01-01 .. 2024-01-31 ')).toEqual(['2024-01-01', '2024-01-31']);
        });

        it('should require exactly two bounds', () => {
            expect(splitRange('100')).toBeNull();
            expect(splitRange('100..')).toBeNull();
            expect(splitRange('1..2..3')).toBeNull();
        });
    });
});
