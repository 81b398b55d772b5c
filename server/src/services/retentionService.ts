import type { RecordStore } from '../db/recordStore';
import { createLogger } from '../logger';
import { subtractDays } from '../lib/time';
import type { PurgeResult } from '../types';

const log = createLogger('PURGE');

export interface RetentionManager {
    readonly horizonDays: number;
    runPurge(now?: Date): PurgeResult;
}

/**
 * Deletes rows older than `now - horizonDays`. Rows exactly at the cutoff stay.
 * Only ever touches expired rows, so it is safe to run at any time.
 */
export const createRetentionManager = (store: RecordStore, horizonDays: number): RetentionManager => ({
    horizonDays,
    runPurge(now = new Date()) {
        const cutoff = subtractDays(now, horizonDays);
        const result: PurgeResult = {
            forecast_removed: store.purgeOlderThan(cutoff, 'forecast'),
            observation_removed: store.purgeOlderThan(cutoff, 'observation'),
        };
        log.info(
            `Removed ${result.forecast_removed} forecasts and ${result.observation_removed} observations older than ${cutoff.toISOString()}`
        );
        return result;
    },
});
