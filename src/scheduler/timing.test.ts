import { describe, it, expect } from 'vitest';
import { assertTimeZone, formatTimeOfDay, jitterMinutes, localTime, nextInterval, parseTimeOfDay } from './timing.js';
import { fixedRandom } from '../testing/fakes.js';

describe('nextInterval', () => {
    it('spans base ± band', () => {
        expect(nextInterval(1000, 200, fixedRandom(0))).toBe(800);
        expect(nextInterval(1000, 200, fixedRandom(0.5))).toBe(1000);
        expect(nextInterval(1000, 200, fixedRandom(1))).toBe(1200);
    });

    it('never goes negative', () => {
        expect(nextInterval(100, 500, fixedRandom(0))).toBe(0);
    });

    it('gives whole-minute digest jitter', () => {
        expect(jitterMinutes(15, fixedRandom(0))).toBe(-15);
        expect(jitterMinutes(15, fixedRandom(0.75))).toBe(8);
    });
});

describe('time of day', () => {
    it('parses HH:MM', () => {
        expect(parseTimeOfDay('08:00')).toBe(480);
        expect(parseTimeOfDay('8:05')).toBe(485);
        expect(parseTimeOfDay('23:59')).toBe(1439);
    });

    it('rejects out-of-range values', () => {
        expect(() => parseTimeOfDay('24:00')).toThrow(RangeError);
        expect(() => parseTimeOfDay('noon')).toThrow('Invalid time of day "noon" (expected HH:MM)');
    });

    it('formats minutes back to HH:MM', () => {
        expect(formatTimeOfDay(485)).toBe('08:05');
    });
});

describe('localTime', () => {
    it('reads the wall clock in the given zone', () => {
        expect(localTime(new Date('2026-10-18T05:10:30Z'), 'Europe/Moscow')).toEqual({
            date: '2026-10-18',
            minuteOfDay: 490,
            secondOfDay: 29430,
        });
    });

    it('rolls the date over at local midnight', () => {
        expect(localTime(new Date('2026-10-18T22:30:00Z'), 'Europe/Moscow')).toMatchObject({
            date: '2026-10-19',
            minuteOfDay: 90,
        });
    });

    it('rejects unknown zones', () => {
        expect(() => assertTimeZone('Mars/Olympus_Mons')).toThrow(RangeError);
    });
});
