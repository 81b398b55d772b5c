const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/** Calendar date (YYYY-MM-DD) of an instant as seen in the given IANA zone. */
export function localDateString(date: Date, timeZone: string): string {
    const formatter = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    });
    return formatter.format(date);
}

export function isIsoDate(value: string): boolean {
    const match = ISO_DATE.exec(value);
    if (!match) return false;
    const [, y, m, d] = match;
    const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    return date.toISOString().slice(0, 10) === value;
}

export function addDays(isoDate: string, days: number): string {
    const [y, m, d] = isoDate.split('-').map(Number);
    return new Date(Date.UTC(y, m - 1, d) + days * DAY_MS).toISOString().slice(0, 10);
}

/** 0 (Sunday) to 6 (Saturday). */
export function dayOfWeek(isoDate: string): number {
    const [y, m, d] = isoDate.split('-').map(Number);
    return new Date(Date.UTC(y, m - 1, d)).getUTCDay();
}

export function subtractDays(now: Date, days: number): Date {
    return new Date(now.getTime() - days * DAY_MS);
}

/** Normalizes any parseable timestamp to `Date#toISOString()` form, or null. */
export function toIsoInstant(value: string): string | null {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/**
 * Bureau feeds print timestamps as `YYYYMMDDhhmmss`.
 * Returns the date and time parts, or null when the text doesn't fit.
 */
export function splitCompactTimestamp(value: string): { date: string; time: string } | null {
    const match = COMPACT_TIMESTAMP.exec(value);
    if (!match) return null;
    const [, y, mo, d, h, mi, s] = match;
    const date = `${y}-${mo}-${d}`;
    if (!isIsoDate(date) || Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) return null;
    return { date, time: `${h}:${mi}:${s}` };
}

/** ISO instant for a date, a wall-clock time and that wall clock's offset from UTC. */
export function instantFromLocal(isoDate: string, hours: number, minutes: number, offsetMinutes: number): string {
    const [y, m, d] = isoDate.split('-').map(Number);
    const utcMs = Date.UTC(y, m - 1, d, hours, minutes) - offsetMinutes * 60_000;
    return new Date(utcMs).toISOString();
}
