import type { RecordStore } from '../db/recordStore';
import { ValidationError } from '../errors';
import { isIsoDate } from '../lib/time';
import type { ComparisonRow, DateRange, ForecastRecord, ObservationRecord, StationScope } from '../types';

export interface ComparisonQuery {
    compare(range: DateRange, stationFilter?: string | null): ComparisonRow[];
}

export const validateRange = (range: DateRange): DateRange => {
    const issues: string[] = [];
    if (!isIsoDate(range.from)) issues.push(`from "${range.from}" is not YYYY-MM-DD`);
    if (!isIsoDate(range.to)) issues.push(`to "${range.to}" is not YYYY-MM-DD`);
    if (issues.length === 0 && range.from > range.to) issues.push('from is after to');
    if (issues.length > 0) throw new ValidationError('Invalid date range', issues);
    return range;
};

const extreme = (values: (number | null)[], pick: (a: number, b: number) => number): number | null =>
    values.reduce<number | null>((acc, v) => (v === null ? acc : acc === null ? v : pick(acc, v)), null);

/**
 * Pairs every forecast in the range with the observations taken on its valid
 * date at the station mapped to its forecast area. Forecasts with nothing
 * observed yet are kept with an empty observation list.
 */
export const createComparisonQuery = (store: RecordStore, scopes: StationScope[]): ComparisonQuery => {
    // forecast station -> observation stations it is compared against (identity always included)
    const observedBy = (forecastStationId: string): Set<string> =>
        new Set([
            forecastStationId,
            ...scopes.filter((s) => s.forecastStationId === forecastStationId).map((s) => s.observationStationId),
        ]);

    // A filter naming an observation station selects the forecast areas mapped to it
    const forecastStationsFor = (stationFilter: string): Set<string> =>
        new Set([
            stationFilter,
            ...scopes.filter((s) => s.observationStationId === stationFilter).map((s) => s.forecastStationId),
        ]);

    return {
        compare(range, stationFilter = null) {
            const { from, to } = validateRange(range);

            let forecasts: ForecastRecord[] = store.query('forecast', { from, to });
            if (stationFilter) {
                const wanted = forecastStationsFor(stationFilter);
                forecasts = forecasts.filter((f) => wanted.has(f.station_id));
            }

            const observationsByDay = new Map<string, ObservationRecord[]>();
            for (const obs of store.query('observation', { from, to })) {
                const key = `${obs.station_id}|${obs.local_date}`;
                const list = observationsByDay.get(key) ?? [];
                list.push(obs);
                observationsByDay.set(key, list);
            }

            return forecasts.map((forecast): ComparisonRow => {
                const observations = Array.from(observedBy(forecast.station_id))
                    .flatMap((stationId) => observationsByDay.get(`${stationId}|${forecast.valid_date}`) ?? [])
                    .sort((a, b) => a.observed_at.localeCompare(b.observed_at));
                return {
                    forecast,
                    observations,
                    observed_max_temp: extreme(observations.map((o) => o.temperature), Math.max),
                    observed_min_temp: extreme(observations.map((o) => o.temperature), Math.min),
                    observed_rainfall: extreme(observations.map((o) => o.rainfall_since_9am), Math.max),
                };
            });
        },
    };
};
