import path from 'path';
import { z } from 'zod';
import {
    DEFAULT_FETCH_RETRIES,
    DEFAULT_FETCH_RETRY_DELAY_MS,
    DEFAULT_FETCH_TIMEOUT_MS,
    DEFAULT_INGEST_CRON,
    DEFAULT_PORT,
    DEFAULT_RETENTION_DAYS,
    DEFAULT_TIMEZONE,
    FORECAST_PRODUCT,
    OBSERVATION_PRODUCT,
} from './constants';
import { ValidationError } from './errors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const sourceUrl = (fallback: string) =>
    z
        .string()
        .url()
        .refine((value) => /^(https?|ftp):\/\//.test(value), 'must be an http(s) or ftp URL')
        .default(fallback);

const timeZone = z
    .string()
    .default(DEFAULT_TIMEZONE)
    .refine((value) => {
        try {
            new Intl.DateTimeFormat('en-CA', { timeZone: value });
            return true;
        } catch {
            return false;
        }
    }, 'unknown IANA time zone');

const EnvSchema = z.object({
    DB_PATH: z.string().min(1).default('weather.db'),
    PORT: positiveInt(DEFAULT_PORT),
    RETENTION_DAYS: positiveInt(DEFAULT_RETENTION_DAYS),
    FETCH_TIMEOUT_MS: positiveInt(DEFAULT_FETCH_TIMEOUT_MS),
    FETCH_RETRIES: positiveInt(DEFAULT_FETCH_RETRIES),
    FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_FETCH_RETRY_DELAY_MS),
    FORECAST_URL: sourceUrl(FORECAST_PRODUCT.url),
    OBSERVATION_URL: sourceUrl(OBSERVATION_PRODUCT.url),
    FORECAST_LOCATION: z.string().trim().min(1).default(FORECAST_PRODUCT.location),
    OBSERVATION_STATION: z.string().trim().min(1).default(OBSERVATION_PRODUCT.station),
    TIMEZONE: timeZone,
    INGEST_CRON: z.string().trim().min(1).default(DEFAULT_INGEST_CRON),
});

export interface AppConfig {
    dbPath: string;
    port: number;
    retentionDays: number;
    fetch: {
        timeoutMs: number;
        retries: number;
        retryDelayMs: number;
    };
    sources: {
        forecast: string;
        observation: string;
    };
    forecastLocation: string;
    observationStation: string;
    timeZone: string;
    ingestCron: string;
}

/**
 * Reads configuration from the environment. Blank variables count as unset.
 * Throws ValidationError naming every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0)
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid configuration',
            parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
        );
    }
    const c = parsed.data;
    return {
        dbPath: c.DB_PATH === ':memory:' ? c.DB_PATH : path.resolve(process.cwd(), c.DB_PATH),
        port: c.PORT,
        retentionDays: c.RETENTION_DAYS,
        fetch: {
            timeoutMs: c.FETCH_TIMEOUT_MS,
            retries: c.FETCH_RETRIES,
            retryDelayMs: c.FETCH_RETRY_DELAY_MS,
        },
        sources: {
            forecast: c.FORECAST_URL,
            observation: c.OBSERVATION_URL,
        },
        forecastLocation: c.FORECAST_LOCATION,
        observationStation: c.OBSERVATION_STATION,
        timeZone: c.TIMEZONE,
        ingestCron: c.INGEST_CRON,
    };
}
