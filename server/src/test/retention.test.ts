import { describe, it, expect } from 'vitest';
import { openDatabase } from '../db';
import { createRecordStore } from '../db/recordStore';
import { createRetentionManager } from '../services/retentionService';
import { forecastRecord, observationRecord } from './fixtures';

const seed = (timeZone: string) => {
    const store = createRecordStore(openDatabase(':memory:'), { timeZone });
    store.upsertMany([
        forecastRecord({ valid_date: '2024-02-29' }),
        forecastRecord({ valid_date: '2024-03-01' }),
        forecastRecord({ valid_date: '2024-03-02' }),
        observationRecord({ observed_at: '2024-03-01T11:59:59.999Z' }),
        observationRecord({ observed_at: '2024-03-01T12:00:00.000Z' }),
        observationRecord({ observed_at: '2024-03-10T00:00:00.000Z', local_date: '2024-03-10' }),
    ]);
    return store;
};

describe('RetentionManager', () => {
    it('removes records older than the horizon and keeps those on the boundary', () => {
        const store = seed('UTC');
        const retention = createRetentionManager(store, 14);

        const result = retention.runPurge(new Date('2024-03-15T12:00:00.000Z'));

        expect(result).toEqual({ forecast_removed: 1, observation_removed: 1 });
        expect(store.query('forecast').map((f) => f.valid_date)).toEqual(['2024-03-01', '2024-03-02']);
        expect(store.query('observation').map((o) => o.observed_at)).toEqual([
            '2024-03-01T12:00:00.000Z',
            '2024-03-10T00:00:00.000Z',
        ]);
    });

    it('is idempotent for the same instant', () => {
        const retention = createRetentionManager(seed('UTC'), 14);
        const now = new Date('2024-03-15T12:00:00.000Z');

        retention.runPurge(now);

        expect(retention.runPurge(now)).toEqual({ forecast_removed: 0, observation_removed: 0 });
    });

    it('judges forecast dates in the station calendar', () => {
        // cutoff 2024-03-01T14:00Z is already 2 March in Hobart
        const now = new Date('2024-03-15T14:00:00.000Z');

        expect(createRetentionManager(seed('UTC'), 14).runPurge(now).forecast_removed).toBe(1);
        expect(createRetentionManager(seed('Australia/Hobart'), 14).runPurge(now).forecast_removed).toBe(2);
    });

    it('honours a configured horizon', () => {
        const retention = createRetentionManager(seed('UTC'), 7);

        expect(retention.horizonDays).toBe(7);
        expect(retention.runPurge(new Date('2024-03-15T12:00:00.000Z'))).toEqual({
            forecast_removed: 3,
            observation_removed: 2,
        });
    });
});
