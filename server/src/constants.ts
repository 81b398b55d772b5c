import type { ProductType } from './types';

// Product: Tasmanian town précis (IDT16710), Bureau anonymous FTP
export const FORECAST_PRODUCT = {
    code: 'IDT16710',
    url: 'ftp://ftp.bom.gov.au/anon/gen/fwo/IDT16710.txt',
    location: 'Dunalley',
};

// Station: Dunalley (Henry Anson), WMO 94951
export const OBSERVATION_PRODUCT = {
    code: 'IDT60801.94951',
    url: 'http://www.bom.gov.au/fwo/IDT60801/IDT60801.94951.json',
    station: '94951',
};

export const DEFAULT_RETENTION_DAYS = 14;
export const DEFAULT_TIMEZONE = 'Australia/Hobart';
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const DEFAULT_FETCH_RETRIES = 3;
export const DEFAULT_FETCH_RETRY_DELAY_MS = 1000;
// Minute 5 of every hour, to let the products settle after publication
export const DEFAULT_INGEST_CRON = '5 * * * *';
export const DEFAULT_PORT = 3001;

// Offsets (minutes east of UTC) for the zone abbreviations the Bureau prints in "Issued at" lines
export const ZONE_OFFSETS_MINUTES: Record<string, number> = {
    UTC: 0,
    GMT: 0,
    WST: 480,
    AWST: 480,
    CST: 570,
    ACST: 570,
    CDT: 630,
    ACDT: 630,
    EST: 600,
    AEST: 600,
    EDT: 660,
    AEDT: 660,
};

export const METADATA_KEYS = {
    lastCycle: 'last_cycle',
    validators: (product: ProductType) => `validators:${product}`,
};
