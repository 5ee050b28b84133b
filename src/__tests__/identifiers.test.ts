import { describe, it, expect } from 'vitest';
import { formatCanonicalKey, parseIdentifier, toCanonicalKey } from '../ingest/identifiers.js';
import { daysBetween, parseCalendarDate } from '../utils/dates.js';

describe('parseIdentifier', () => {
    it('should parse a 510(k) number in any case', () => {
        expect(parseIdentifier('k203456')).toEqual({ baseKey: 'K203456', supplementSeq: 0, deviceType: '510k' });
    });

    it('should parse PMA supplements in every accepted spelling', () => {
        for (const raw of ['P170019/S001', ' p170019 s001 ', 'P170019S001', 'P170019-S1']) {
            expect(parseIdentifier(raw)).toEqual({ baseKey: 'P170019', supplementSeq: 1, deviceType: 'pma' });
        }
    });

    it('should detect De Novo and pre-amendment numbers', () => {
        expect(parseIdentifier('DEN200045')?.deviceType).toBe('de_novo');
        expect(parseIdentifier('DEN2000451')?.deviceType).toBe('de_novo');
        expect(parseIdentifier('N18123')?.deviceType).toBe('pre_amendment');
        expect(parseIdentifier('N1812')?.deviceType).toBe('pre_amendment');
    });

    it('should reject values of the wrong width or prefix', () => {
        for (const raw of ['', 'K12345', 'K2034567', 'X123456', 'DEN12345', 'N123', 'not-a-key']) {
            expect(parseIdentifier(raw)).toBeNull();
        }
    });
});

describe('canonical keys', () => {
    it('should leave base submissions unchanged', () => {
        expect(formatCanonicalKey('K203456', 0)).toBe('K203456');
    });

    it('should zero-pad supplement numbers to three digits', () => {
        expect(formatCanonicalKey('P170019', 12)).toBe('P170019/S012');
        expect(toCanonicalKey('p170019 s1')).toBe('P170019/S001');
    });

    it('should return null for unparsable input', () => {
        expect(toCanonicalKey('garbage')).toBeNull();
    });
});

describe('dates', () => {
    it('should accept ISO and US calendar dates', () => {
        expect(parseCalendarDate('2021-03-04')).toBe('2021-03-04');
        expect(parseCalendarDate('3/4/2021')).toBe('2021-03-04');
        expect(parseCalendarDate('2021-03-04T10:00:00')).toBe('2021-03-04');
    });

    it('should reject impossible or unknown formats', () => {
        expect(parseCalendarDate('2023-02-30')).toBeNull();
        expect(parseCalendarDate('March 4')).toBeNull();
    });

    it('should count calendar days across a leap year', () => {
        expect(daysBetween('2020-01-01', '2020-03-01')).toBe(60);
        expect(daysBetween('2020-03-01', '2020-01-01')).toBe(-60);
    });
});
