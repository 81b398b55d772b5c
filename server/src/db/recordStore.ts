import type { DatabaseHandle } from './index';
import { StoreError, errorMessage } from '../errors';
import { isIsoDate, localDateString, toIsoInstant } from '../lib/time';
import type {
    ForecastRecord,
    ObservationRecord,
    RecordFilter,
    RecordType,
    WeatherRecord,
} from '../types';

type ForecastRow = Omit<ForecastRecord, 'kind'>;
type ObservationRow = Omit<ObservationRecord, 'kind'>;

export interface RecordStore {
    upsert(record: WeatherRecord): void;
    upsertMany(records: WeatherRecord[]): number;
    purgeOlderThan(cutoff: Date, recordType: RecordType): number;
    query(recordType: 'forecast', filter?: RecordFilter): ForecastRecord[];
    query(recordType: 'observation', filter?: RecordFilter): ObservationRecord[];
    query(recordType: RecordType, filter?: RecordFilter): WeatherRecord[];
    count(recordType: RecordType): number;
    listStations(): string[];
    getMetadata(key: string): unknown;
    setMetadata(key: string, value: unknown): void;
}

export interface RecordStoreOptions {
    /** Zone whose calendar decides which forecast dates fall before a purge cutoff. */
    timeZone: string;
}

const TABLES: Record<RecordType, { table: string; dateColumn: string; order: string }> = {
    forecast: { table: 'forecasts', dateColumn: 'valid_date', order: 'valid_date ASC, period_index ASC, station_id ASC' },
    observation: { table: 'observations', dateColumn: 'local_date', order: 'observed_at ASC, station_id ASC' },
};

const guard = <T>(action: string, fn: () => T): T => {
    try {
        return fn();
    } catch (err) {
        if (err instanceof StoreError) throw err;
        throw new StoreError(`${action} failed: ${errorMessage(err)}`, 0, { cause: err });
    }
};

/**
 * SQLite-backed store keyed on each record type's natural key.
 * A colliding upsert replaces every non-key column unless the stored row was fetched later.
 */
export const createRecordStore = (db: DatabaseHandle, options: RecordStoreOptions): RecordStore => {
    const upsertForecastStmt = db.prepare<ForecastRow>(`
        INSERT INTO forecasts (station_id, valid_date, period_index, issued_at, summary_text,
            min_temp, max_temp, rain_probability, rain_amount_range, fetched_at)
        VALUES (@station_id, @valid_date, @period_index, @issued_at, @summary_text,
            @min_temp, @max_temp, @rain_probability, @rain_amount_range, @fetched_at)
        ON CONFLICT(station_id, valid_date, period_index) DO UPDATE SET
            issued_at = excluded.issued_at,
            summary_text = excluded.summary_text,
            min_temp = excluded.min_temp,
            max_temp = excluded.max_temp,
            rain_probability = excluded.rain_probability,
            rain_amount_range = excluded.rain_amount_range,
            fetched_at = excluded.fetched_at
        WHERE excluded.fetched_at >= forecasts.fetched_at
    `);

    const upsertObservationStmt = db.prepare<ObservationRow>(`
        INSERT INTO observations (station_id, observed_at, local_date, temperature, humidity,
            wind_speed, wind_direction, rainfall_since_9am, fetched_at)
        VALUES (@station_id, @observed_at, @local_date, @temperature, @humidity,
            @wind_speed, @wind_direction, @rainfall_since_9am, @fetched_at)
        ON CONFLICT(station_id, observed_at) DO UPDATE SET
            local_date = excluded.local_date,
            temperature = excluded.temperature,
            humidity = excluded.humidity,
            wind_speed = excluded.wind_speed,
            wind_direction = excluded.wind_direction,
            rainfall_since_9am = excluded.rainfall_since_9am,
            fetched_at = excluded.fetched_at
        WHERE excluded.fetched_at >= observations.fetched_at
    `);

    const getMetadataStmt = db.prepare<[string], { value: string | null }>('SELECT value FROM metadata WHERE key = ?');
    const setMetadataStmt = db.prepare<[string, string]>(`
        INSERT INTO metadata (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);

    const instant = (value: string, field: string): string => {
        const iso = toIsoInstant(value);
        if (!iso) throw new StoreError(`${field} is not a valid timestamp: ${value}`);
        return iso;
    };

    const upsertForecast = (record: ForecastRecord) => {
        if (!isIsoDate(record.valid_date)) {
            throw new StoreError(`valid_date is not a calendar date: ${record.valid_date}`);
        }
        upsertForecastStmt.run({
            station_id: record.station_id,
            valid_date: record.valid_date,
            period_index: record.period_index,
            issued_at: instant(record.issued_at, 'issued_at'),
            summary_text: record.summary_text,
            min_temp: record.min_temp,
            max_temp: record.max_temp,
            rain_probability: record.rain_probability,
            rain_amount_range: record.rain_amount_range,
            fetched_at: instant(record.fetched_at, 'fetched_at'),
        });
    };

    const upsertObservation = (record: ObservationRecord) => {
        if (!isIsoDate(record.local_date)) {
            throw new StoreError(`local_date is not a calendar date: ${record.local_date}`);
        }
        upsertObservationStmt.run({
            station_id: record.station_id,
            observed_at: instant(record.observed_at, 'observed_at'),
            local_date: record.local_date,
            temperature: record.temperature,
            humidity: record.humidity,
            wind_speed: record.wind_speed,
            wind_direction: record.wind_direction,
            rainfall_since_9am: record.rainfall_since_9am,
            fetched_at: instant(record.fetched_at, 'fetched_at'),
        });
    };

    const upsert = (record: WeatherRecord) =>
        guard(`upsert ${record.kind}`, () => {
            if (record.kind === 'forecast') upsertForecast(record);
            else upsertObservation(record);
        });

    const upsertMany = (records: WeatherRecord[]): number => {
        let written = 0;
        for (const record of records) {
            try {
                upsert(record);
            } catch (err) {
                throw new StoreError(
                    `${errorMessage(err)} (after ${written} of ${records.length} records)`,
                    written,
                    { cause: err }
                );
            }
            written++;
        }
        return written;
    };

    const purgeOlderThan = (cutoff: Date, recordType: RecordType): number =>
        guard(`purge ${recordType}`, () => {
            if (recordType === 'forecast') {
                const cutoffDate = localDateString(cutoff, options.timeZone);
                return db.prepare<[string]>('DELETE FROM forecasts WHERE valid_date < ?').run(cutoffDate).changes;
            }
            return db
                .prepare<[string]>('DELETE FROM observations WHERE observed_at < ?')
                .run(cutoff.toISOString()).changes;
        });

    const selectRows = <Row>(recordType: RecordType, filter: RecordFilter): Row[] => {
        const { table, dateColumn, order } = TABLES[recordType];
        const conditions: string[] = [];
        const params: string[] = [];
        if (filter.from) {
            conditions.push(`${dateColumn} >= ?`);
            params.push(filter.from);
        }
        if (filter.to) {
            conditions.push(`${dateColumn} <= ?`);
            params.push(filter.to);
        }
        if (filter.stationId) {
            conditions.push('station_id = ?');
            params.push(filter.stationId);
        }
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        return db.prepare<string[], Row>(`SELECT * FROM ${table} ${where} ORDER BY ${order}`).all(...params);
    };

    function query(recordType: 'forecast', filter?: RecordFilter): ForecastRecord[];
    function query(recordType: 'observation', filter?: RecordFilter): ObservationRecord[];
    function query(recordType: RecordType, filter?: RecordFilter): WeatherRecord[];
    function query(recordType: RecordType, filter: RecordFilter = {}): WeatherRecord[] {
        return guard(`query ${recordType}`, () => {
            if (recordType === 'forecast') {
                return selectRows<ForecastRow>('forecast', filter).map((row): ForecastRecord => ({ kind: 'forecast', ...row }));
            }
            return selectRows<ObservationRow>('observation', filter).map(
                (row): ObservationRecord => ({ kind: 'observation', ...row })
            );
        });
    }

    const count = (recordType: RecordType): number =>
        guard(`count ${recordType}`, () => {
            const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${TABLES[recordType].table}`).get();
            return row ? row.n : 0;
        });

    const listStations = (): string[] =>
        guard('list stations', () =>
            db
                .prepare<[], { station_id: string }>(
                    'SELECT station_id FROM forecasts UNION SELECT station_id FROM observations ORDER BY station_id ASC'
                )
                .all()
                .map((row) => row.station_id)
        );

    const getMetadata = (key: string): unknown =>
        guard(`read metadata ${key}`, () => {
            const row = getMetadataStmt.get(key);
            if (!row || row.value === null) return null;
            const value: unknown = JSON.parse(row.value);
            return value;
        });

    const setMetadata = (key: string, value: unknown) =>
        guard(`write metadata ${key}`, () => {
            setMetadataStmt.run(key, JSON.stringify(value));
        });

    return { upsert, upsertMany, purgeOlderThan, query, count, listStations, getMetadata, setMetadata };
};
