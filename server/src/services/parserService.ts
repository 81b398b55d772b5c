import { z } from 'zod';
import { ZONE_OFFSETS_MINUTES } from '../constants';
import { ParseError } from '../errors';
import { createLogger } from '../logger';
import { addDays, dayOfWeek, instantFromLocal, isIsoDate, localDateString, splitCompactTimestamp } from '../lib/time';
import type {
    ForecastRecord,
    ObservationRecord,
    ParseResult,
    ProductType,
    SkippedRecord,
    WeatherRecord,
} from '../types';

const log = createLogger('PARSE');

export interface ParserContext {
    /** Précis location whose lines are extracted; also the forecast station_id. */
    forecastLocation: string;
    /** Station id used when an observation carries no WMO number. */
    observationStation: string;
    timeZone: string;
    fetchedAt: string;
}

// =============================================================================
// Précis forecast (text)
// =============================================================================

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const ISSUED_AT = /Issued at (\d{1,2}):(\d{2})\s*(am|pm)\s+([A-Z]{2,5}) on [A-Za-z]+ (\d{1,2}) ([A-Za-z]+) (\d{4})/i;
const SECTION_HEADING = /^Forecast for (?:the rest of )?(.+)$/gm;
const HEADING_DAY = /^([A-Za-z]+)(?:\s+(\d{1,2}))?/;
// Precis sections never run past a week and a day
const MAX_LOOKAHEAD_DAYS = 14;
const FIELD_START = /\b(?:Min(?:imum)?|Max(?:imum)?|Chance of any rain|Possible rainfall)\b/i;

const ForecastFields = z
    .object({
        summary_text: z.string().min(1, 'summary is empty'),
        min_temp: z.number().int().nullable(),
        max_temp: z.number().int().nullable(),
        rain_probability: z.number().int().min(0).max(100).nullable(),
        rain_amount_range: z.string().nullable(),
    })
    .refine((f) => f.min_temp === null || f.max_temp === null || f.min_temp <= f.max_temp, {
        message: 'minimum exceeds maximum',
        path: ['min_temp'],
    });

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function parseIssuedAt(raw: string): { issuedAt: string; issueDate: string } {
    const match = ISSUED_AT.exec(raw);
    if (!match) {
        throw new ParseError('forecast', 'issued_at', 'no "Issued at ... on <date>" line');
    }
    const [, hh, mm, meridiem, zone, day, monthName, year] = match;
    const month = MONTHS.indexOf(monthName.slice(0, 3).toLowerCase());
    const issueDate = `${year}-${String(month + 1).padStart(2, '0')}-${day.padStart(2, '0')}`;
    if (month < 0 || !isIsoDate(issueDate)) {
        throw new ParseError('forecast', 'issued_at', `unrecognised date "${day} ${monthName} ${year}"`);
    }
    const offset = ZONE_OFFSETS_MINUTES[zone.toUpperCase()];
    if (offset === undefined) {
        throw new ParseError('forecast', 'issued_at', `unknown time zone "${zone}"`);
    }
    const hour12 = Number(hh);
    const minutes = Number(mm);
    if (hour12 < 1 || hour12 > 12 || minutes > 59) {
        throw new ParseError('forecast', 'issued_at', `unrecognised time "${hh}:${mm} ${meridiem}"`);
    }
    const hours = (hour12 % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0);
    return { issuedAt: instantFromLocal(issueDate, hours, minutes, offset), issueDate };
}

interface Section {
    heading: string;
    text: string;
}

function splitSections(raw: string): Section[] {
    const matches = Array.from(raw.matchAll(SECTION_HEADING));
    return matches.map((m, i) => ({
        heading: m[1].trim(),
        text: raw.slice(m.index ?? 0, matches[i + 1]?.index ?? raw.length),
    }));
}

/**
 * Date a section heading ("Saturday 2 March", "Friday") refers to: the first
 * date on or after `earliest` with that weekday and, when given, day of month.
 * `undefined` when the heading names no weekday; null when nothing matches.
 */
function resolveHeadingDate(heading: string, earliest: string): string | null | undefined {
    const match = HEADING_DAY.exec(heading);
    const weekday = match ? WEEKDAYS.indexOf(match[1].toLowerCase()) : -1;
    if (!match || weekday < 0) return undefined;
    const dayOfMonth = match[2] === undefined ? null : Number(match[2]);
    for (let offset = 0; offset < MAX_LOOKAHEAD_DAYS; offset++) {
        const candidate = addDays(earliest, offset);
        if (dayOfWeek(candidate) === weekday && (dayOfMonth === null || Number(candidate.slice(8)) === dayOfMonth)) {
            return candidate;
        }
    }
    return null;
}

/** The location's line within a section, with any indented continuation lines joined on. */
function findLocationText(section: string, location: string): string | null {
    const lines = section.split(/\r?\n/);
    // A single space after the name means a longer location ("Hobart Airport")
    const head = new RegExp(`^${escapeRegExp(location)}(?::\\s*|\\s{2,}|$)(.*)$`);
    for (let i = 0; i < lines.length; i++) {
        const match = head.exec(lines[i]);
        if (!match) continue;
        const parts = [match[1].trim()];
        for (let j = i + 1; j < lines.length && /^\s+\S/.test(lines[j]); j++) {
            parts.push(lines[j].trim());
        }
        return parts.join(' ').trim();
    }
    return null;
}

const token = (text: string, pattern: RegExp): string | null => pattern.exec(text)?.[1] ?? null;
const toNumber = (value: string | null): number | null => (value === null ? null : Number(value));

function extractFields(text: string) {
    const fieldStart = FIELD_START.exec(text);
    const summary = (fieldStart ? text.slice(0, fieldStart.index) : text).trim();
    const range = token(text, /Possible rainfall:?\s+(\d+(?:\.\d+)?\s+to\s+\d+(?:\.\d+)?\s*mm)/i);
    return {
        summary_text: summary,
        min_temp: toNumber(token(text, /\bMin(?:imum)?\s+([^\s.]+)/i)),
        max_temp: toNumber(token(text, /\bMax(?:imum)?\s+([^\s.]+)/i)),
        rain_probability: toNumber(token(text, /Chance of any rain:?\s+([^\s%]+)%/i)),
        rain_amount_range: range === null ? null : range.replace(/\s+/g, ' '),
    };
}

/**
 * Parses a précis text product into one record per forecast period for the
 * configured location. Periods that can't be read are skipped and reported.
 */
export function parseForecastProduct(raw: string, ctx: ParserContext): ParseResult<ForecastRecord> {
    const { issuedAt, issueDate } = parseIssuedAt(raw);
    const sections = splitSections(raw);
    if (sections.length === 0) {
        throw new ParseError('forecast', 'sections', 'no "Forecast for" sections found');
    }

    const records: ForecastRecord[] = [];
    const skipped: SkippedRecord[] = [];

    // Each section's date is searched for from the day after the previous one
    let earliest = issueDate;

    sections.forEach((section, periodIndex) => {
        const resolved = resolveHeadingDate(section.heading, earliest);
        if (resolved === null) {
            skipped.push({
                product: 'forecast',
                index: periodIndex,
                field: 'valid_date',
                reason: `heading "${section.heading}" matches no date from ${earliest}`,
            });
            return;
        }
        const validDate = resolved ?? addDays(issueDate, periodIndex);
        earliest = addDays(validDate, 1);

        const text = findLocationText(section.text, ctx.forecastLocation);
        if (text === null) {
            skipped.push({
                product: 'forecast',
                index: periodIndex,
                field: 'location',
                reason: `no line for ${ctx.forecastLocation}`,
            });
            return;
        }

        const fields = ForecastFields.safeParse(extractFields(text));
        if (!fields.success) {
            const issue = fields.error.issues[0];
            skipped.push({
                product: 'forecast',
                index: periodIndex,
                field: issue.path.join('.') || 'record',
                reason: issue.message,
            });
            return;
        }

        records.push({
            kind: 'forecast',
            station_id: ctx.forecastLocation,
            issued_at: issuedAt,
            valid_date: validDate,
            period_index: periodIndex,
            ...fields.data,
            fetched_at: ctx.fetchedAt,
        });
    });

    log.info(`Parsed ${records.length} forecast periods, skipped ${skipped.length}`);
    return { records, skipped };
}

// =============================================================================
// Station observations (JSON)
// =============================================================================

const ObservationEnvelope = z.object({
    observations: z.object({
        data: z.array(z.unknown()),
    }),
});

const compactTimestamp = z.string().regex(/^\d{14}$/, 'expected YYYYMMDDhhmmss');

const ObservationItem = z.object({
    wmo: z.union([z.number().int(), z.string().min(1)]).nullish(),
    aifstime_utc: compactTimestamp,
    local_date_time_full: compactTimestamp.nullish(),
    air_temp: z.number().nullish(),
    rel_hum: z.number().nullish(),
    wind_spd_kmh: z.number().nullish(),
    wind_dir: z.string().nullish(),
    rain_trace: z.union([z.string(), z.number()]).nullish(),
});

// rain_trace is text in the feed; "-" and blanks mean no reading
const rainfall = (value: string | number | null | undefined): number | null => {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string' || !/^\d+(?:\.\d+)?$/.test(value.trim())) return null;
    return Number(value.trim());
};

const cleanText = (value: string | null | undefined): string | null => {
    const trimmed = value?.trim();
    return trimmed && trimmed !== '-' ? trimmed : null;
};

/**
 * Parses the station observation JSON product. Items that fail validation are
 * skipped and reported; the rest become one record each.
 */
export function parseObservationProduct(raw: string, ctx: ParserContext): ParseResult<ObservationRecord> {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new ParseError('observation', 'payload', 'not valid JSON');
    }
    const envelope = ObservationEnvelope.safeParse(json);
    if (!envelope.success) {
        throw new ParseError('observation', 'observations.data', 'missing or not an array');
    }

    const records: ObservationRecord[] = [];
    const skipped: SkippedRecord[] = [];

    envelope.data.observations.data.forEach((item, index) => {
        const parsed = ObservationItem.safeParse(item);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            skipped.push({ product: 'observation', index, field: issue.path.join('.') || 'record', reason: issue.message });
            return;
        }
        const obs = parsed.data;
        const utc = splitCompactTimestamp(obs.aifstime_utc);
        if (!utc) {
            skipped.push({ product: 'observation', index, field: 'aifstime_utc', reason: 'not a valid timestamp' });
            return;
        }
        const observedAt = `${utc.date}T${utc.time}.000Z`;
        const local = obs.local_date_time_full ? splitCompactTimestamp(obs.local_date_time_full) : null;

        records.push({
            kind: 'observation',
            station_id: obs.wmo !== null && obs.wmo !== undefined ? String(obs.wmo) : ctx.observationStation,
            observed_at: observedAt,
            local_date: local ? local.date : localDateString(new Date(observedAt), ctx.timeZone),
            temperature: obs.air_temp ?? null,
            humidity: obs.rel_hum ?? null,
            wind_speed: obs.wind_spd_kmh ?? null,
            wind_direction: cleanText(obs.wind_dir),
            rainfall_since_9am: rainfall(obs.rain_trace),
            fetched_at: ctx.fetchedAt,
        });
    });

    log.info(`Parsed ${records.length} observations, skipped ${skipped.length}`);
    return { records, skipped };
}

/** Dispatches a raw payload to the parser for its product type. */
export function parseProduct(raw: string, product: ProductType, ctx: ParserContext): ParseResult<WeatherRecord> {
    switch (product) {
        case 'forecast':
            return parseForecastProduct(raw, ctx);
        case 'observation':
            return parseObservationProduct(raw, ctx);
    }
}
