export type ProductType = 'forecast' | 'observation';
export type RecordType = ProductType;

/**
 * One period of a précis issuance for a forecast area.
 * Keyed by (station_id, valid_date, period_index).
 */
export interface ForecastRecord {
    kind: 'forecast';
    station_id: string;
    issued_at: string;
    valid_date: string;
    period_index: number;
    summary_text: string;
    min_temp: number | null;
    max_temp: number | null;
    rain_probability: number | null;
    rain_amount_range: string | null;
    fetched_at: string;
}

/**
 * A single station reading. Keyed by (station_id, observed_at).
 * local_date is the station-local calendar day the reading belongs to.
 */
export interface ObservationRecord {
    kind: 'observation';
    station_id: string;
    observed_at: string;
    local_date: string;
    temperature: number | null;
    humidity: number | null;
    wind_speed: number | null;
    wind_direction: string | null;
    rainfall_since_9am: number | null;
    fetched_at: string;
}

export type WeatherRecord = ForecastRecord | ObservationRecord;

export interface RecordsByType {
    forecast: ForecastRecord;
    observation: ObservationRecord;
}

export interface SkippedRecord {
    product: ProductType;
    index: number;
    field: string;
    reason: string;
}

export interface ParseResult<T extends WeatherRecord = WeatherRecord> {
    records: T[];
    skipped: SkippedRecord[];
}

export interface FetchValidators {
    etag: string | null;
    lastModified: string | null;
}

export type FetchResult =
    | ({ status: 'ok'; body: string } & FetchValidators)
    | { status: 'not-modified' };

export interface RecordFilter {
    from?: string;
    to?: string;
    stationId?: string;
}

export interface DateRange {
    from: string;
    to: string;
}

export interface StationScope {
    forecastStationId: string;
    observationStationId: string;
}

export interface ComparisonRow {
    forecast: ForecastRecord;
    observations: ObservationRecord[];
    observed_max_temp: number | null;
    observed_min_temp: number | null;
    observed_rainfall: number | null;
}

export interface PurgeResult {
    forecast_removed: number;
    observation_removed: number;
}

export type ProductStatus = 'ok' | 'not-modified' | 'failed';

export interface ProductOutcome {
    product: ProductType;
    status: ProductStatus;
    upserted: number;
    skipped: SkippedRecord[];
    error: string | null;
}

export interface CycleReport {
    started_at: string;
    finished_at: string;
    forecast: ProductOutcome;
    observation: ProductOutcome;
    purged: PurgeResult | null;
    errors: string[];
    ok: boolean;
}
