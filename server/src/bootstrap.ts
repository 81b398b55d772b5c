import type { AppConfig } from './config';
import { openDatabase, type DatabaseHandle } from './db';
import { createRecordStore, type RecordStore } from './db/recordStore';
import { createComparisonQuery, type ComparisonQuery } from './services/comparisonService';
import { createRawFetcher, type RawFetcher } from './services/fetcherService';
import { createIngestionPipeline, type IngestionPipeline } from './services/ingestService';
import { createRetentionManager, type RetentionManager } from './services/retentionService';

export interface Services {
    db: DatabaseHandle;
    store: RecordStore;
    retention: RetentionManager;
    comparison: ComparisonQuery;
    pipeline: IngestionPipeline;
}

/**
 * Wires every component around one database handle. The caller owns the
 * handle's lifetime and closes `db` when the run is over.
 */
export const createServices = (
    config: AppConfig,
    overrides: { db?: DatabaseHandle; fetcher?: RawFetcher } = {}
): Services => {
    const db = overrides.db ?? openDatabase(config.dbPath);
    const store = createRecordStore(db, { timeZone: config.timeZone });
    const retention = createRetentionManager(store, config.retentionDays);
    const comparison = createComparisonQuery(store, [
        { forecastStationId: config.forecastLocation, observationStationId: config.observationStation },
    ]);
    const fetcher =
        overrides.fetcher ??
        createRawFetcher({
            sources: config.sources,
            timeoutMs: config.fetch.timeoutMs,
        });
    const pipeline = createIngestionPipeline({
        store,
        fetcher,
        retention,
        parser: {
            forecastLocation: config.forecastLocation,
            observationStation: config.observationStation,
            timeZone: config.timeZone,
        },
        retries: config.fetch.retries,
        retryDelayMs: config.fetch.retryDelayMs,
    });
    return { db, store, retention, comparison, pipeline };
};
