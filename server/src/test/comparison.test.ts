import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../db';
import { createRecordStore, type RecordStore } from '../db/recordStore';
import { ValidationError } from '../errors';
import { createComparisonQuery, type ComparisonQuery } from '../services/comparisonService';
import { forecastRecord, observationRecord } from './fixtures';

describe('ComparisonQuery', () => {
    let store: RecordStore;
    let comparison: ComparisonQuery;

    beforeEach(() => {
        store = createRecordStore(openDatabase(':memory:'), { timeZone: 'UTC' });
        comparison = createComparisonQuery(store, [{ forecastStationId: 'Dunalley', observationStationId: '94951' }]);
    });

    it('pairs a forecast only with observations from its valid date', () => {
        store.upsertMany([
            forecastRecord({ valid_date: '2024-03-01' }),
            observationRecord({ observed_at: '2024-03-01T09:00:00.000Z', local_date: '2024-03-01' }),
            observationRecord({ observed_at: '2024-03-02T09:00:00.000Z', local_date: '2024-03-02' }),
        ]);

        const rows = comparison.compare({ from: '2024-03-01', to: '2024-03-02' });

        expect(rows).toHaveLength(1);
        expect(rows[0].forecast.valid_date).toBe('2024-03-01');
        expect(rows[0].observations.map((o) => o.observed_at)).toEqual(['2024-03-01T09:00:00.000Z']);
    });

    it('keeps forecasts that have nothing observed yet', () => {
        store.upsert(forecastRecord({ valid_date: '2024-03-05' }));

        expect(comparison.compare({ from: '2024-03-05', to: '2024-03-05' })).toEqual([
            {
                forecast: forecastRecord({ valid_date: '2024-03-05' }),
                observations: [],
                observed_max_temp: null,
                observed_min_temp: null,
                observed_rainfall: null,
            },
        ]);
    });

    it('orders rows by date then period and observations by time', () => {
        store.upsertMany([
            forecastRecord({ valid_date: '2024-03-02', period_index: 1 }),
            forecastRecord({ valid_date: '2024-03-01', period_index: 0 }),
            forecastRecord({ valid_date: '2024-03-02', period_index: 0 }),
            observationRecord({ observed_at: '2024-03-01T21:00:00.000Z', local_date: '2024-03-02' }),
            observationRecord({ observed_at: '2024-03-01T15:00:00.000Z', local_date: '2024-03-02' }),
        ]);

        const rows = comparison.compare({ from: '2024-03-01', to: '2024-03-02' });

        expect(rows.map((r) => [r.forecast.valid_date, r.forecast.period_index])).toEqual([
            ['2024-03-01', 0],
            ['2024-03-02', 0],
            ['2024-03-02', 1],
        ]);
        expect(rows[1].observations.map((o) => o.observed_at)).toEqual([
            '2024-03-01T15:00:00.000Z',
            '2024-03-01T21:00:00.000Z',
        ]);
        expect(rows[2].observations).toHaveLength(2);
    });

    it('summarises the aligned observations', () => {
        store.upsertMany([
            forecastRecord(),
            observationRecord({ observed_at: '2024-03-01T00:00:00.000Z', temperature: 12.5, rainfall_since_9am: 0 }),
            observationRecord({ observed_at: '2024-03-01T04:00:00.000Z', temperature: 18, rainfall_since_9am: 1.2 }),
            observationRecord({ observed_at: '2024-03-01T08:00:00.000Z', temperature: null, rainfall_since_9am: null }),
        ]);

        const [row] = comparison.compare({ from: '2024-03-01', to: '2024-03-01' });

        expect(row.observed_max_temp).toBe(18);
        expect(row.observed_min_temp).toBe(12.5);
        expect(row.observed_rainfall).toBe(1.2);
    });

    it('only pairs stations within the same scope', () => {
        store.upsertMany([
            forecastRecord({ station_id: 'Hobart' }),
            forecastRecord(),
            observationRecord(),
            observationRecord({ station_id: '94970' }),
        ]);

        const rows = comparison.compare({ from: '2024-03-01', to: '2024-03-01' });

        expect(rows.map((r) => [r.forecast.station_id, r.observations.map((o) => o.station_id)])).toEqual([
            ['Dunalley', ['94951']],
            ['Hobart', []],
        ]);
    });

    it('filters by either side of a station scope', () => {
        store.upsertMany([forecastRecord({ station_id: 'Hobart' }), forecastRecord(), observationRecord()]);
        const range = { from: '2024-03-01', to: '2024-03-01' };

        expect(comparison.compare(range, '94951').map((r) => r.forecast.station_id)).toEqual(['Dunalley']);
        expect(comparison.compare(range, 'Dunalley').map((r) => r.forecast.station_id)).toEqual(['Dunalley']);
        expect(comparison.compare(range, 'Hobart').map((r) => r.forecast.station_id)).toEqual(['Hobart']);
        expect(comparison.compare(range, 'Nowhere')).toEqual([]);
    });

    it('rejects malformed or inverted ranges', () => {
        expect(() => comparison.compare({ from: '2024-03-02', to: '2024-03-01' })).toThrow(ValidationError);
        expect(() => comparison.compare({ from: '01/03/2024', to: '2024-03-01' })).toThrow(
            'Invalid date range: from "01/03/2024" is not YYYY-MM-DD'
        );
    });
});
