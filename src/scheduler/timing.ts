import type { RandomSource } from './clock.js';

// ============================================================================
// Herald — Timing
// Jittered intervals and local-time arithmetic for digest slots
// ============================================================================

/**
 * `base ± band`, uniformly. Never negative; the caller applies its own floor.
 */
export function nextInterval(baseMs: number, jitterBandMs: number, rng: RandomSource): number {
    const offset = (rng() * 2 - 1) * jitterBandMs;
    return Math.max(0, Math.round(baseMs + offset));
}

/** Whole minutes in `[-band, +band]`. */
export function jitterMinutes(bandMinutes: number, rng: RandomSource): number {
    return Math.round((rng() * 2 - 1) * bandMinutes);
}

/** Parse "HH:MM" (24h) into minutes after midnight. */
export function parseTimeOfDay(value: string): number {
    const match = /^([01]?\d|2[0-3]):([0-5]\d)$/.exec(value.trim());
    if (!match) throw new RangeError(`Invalid time of day "${value}" (expected HH:MM)`);
    return Number(match[1]) * 60 + Number(match[2]);
}

export function formatTimeOfDay(minuteOfDay: number): string {
    const h = Math.floor(minuteOfDay / 60);
    const m = minuteOfDay % 60;
    return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

export interface LocalTime {
    /** Calendar date in the zone, YYYY-MM-DD */
    date: string;
    minuteOfDay: number;
    secondOfDay: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let fmt = formatters.get(timeZone);
    if (!fmt) {
        fmt = new Intl.DateTimeFormat('en-CA', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
            hourCycle: 'h23',
        });
        formatters.set(timeZone, fmt);
    }
    return fmt;
}

/** Wall-clock reading of `instant` in `timeZone`. */
export function localTime(instant: Date, timeZone: string): LocalTime {
    const parts: Record<string, string> = {};
    for (const p of formatterFor(timeZone).formatToParts(instant)) {
        parts[p.type] = p.value;
    }
    const hour = Number(parts.hour);
    const minute = Number(parts.minute);
    const second = Number(parts.second);
    return {
        date: `${parts.year}-${parts.month}-${parts.day}`,
        minuteOfDay: hour * 60 + minute,
        secondOfDay: hour * 3600 + minute * 60 + second,
    };
}

/** Throws a RangeError for an unknown IANA zone. */
export function assertTimeZone(timeZone: string): void {
    new Intl.DateTimeFormat('en-US', { timeZone });
}
