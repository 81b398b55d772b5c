import { z } from 'zod';
import { METADATA_KEYS } from '../constants';
import type { RecordStore } from '../db/recordStore';
import { FetchError, ParseError, StoreError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { CycleReport, FetchResult, FetchValidators, ProductOutcome, ProductType, PurgeResult } from '../types';
import type { RawFetcher } from './fetcherService';
import { parseProduct, type ParserContext } from './parserService';
import type { RetentionManager } from './retentionService';

const log = createLogger('INGEST');

const ValidatorsSchema = z.object({
    etag: z.string().nullable(),
    lastModified: z.string().nullable(),
});

export interface IngestionPipelineOptions {
    store: RecordStore;
    fetcher: RawFetcher;
    retention: RetentionManager;
    parser: Omit<ParserContext, 'fetchedAt'>;
    /** Fetch attempts per product per cycle. */
    retries: number;
    retryDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface IngestionPipeline {
    /** Runs fetch, parse and upsert for both products, then the retention purge. Null when a cycle is already running. */
    runCycle(now?: Date): Promise<CycleReport | null>;
    isRunning(): boolean;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Client errors other than 429 won't change on a retry
const isRetryable = (err: unknown): boolean =>
    err instanceof FetchError && (err.status === null || err.status === 429 || err.status >= 500);

interface ProductRun {
    outcome: ProductOutcome;
    fatal: Error | null;
}

export const createIngestionPipeline = (options: IngestionPipelineOptions): IngestionPipeline => {
    const { store, fetcher, retention } = options;
    const sleep = options.sleep ?? defaultSleep;
    let running = false;

    // Exponential backoff over the fetcher, which itself never retries
    const fetchWithRetry = async (product: ProductType, validators: FetchValidators | null): Promise<FetchResult> => {
        for (let attempt = 0; ; attempt++) {
            try {
                return await fetcher.fetch(product, validators);
            } catch (err) {
                if (attempt >= options.retries - 1 || !isRetryable(err)) throw err;
                const delay = options.retryDelayMs * Math.pow(2, attempt);
                log.info(`${product}: attempt ${attempt + 1} failed (${errorMessage(err)}), retrying in ${delay}ms`);
                await sleep(delay);
            }
        }
    };

    const loadValidators = (product: ProductType): FetchValidators | null => {
        const parsed = ValidatorsSchema.safeParse(store.getMetadata(METADATA_KEYS.validators(product)));
        return parsed.success ? parsed.data : null;
    };

    const ingestProduct = async (product: ProductType, fetchedAt: string): Promise<ProductRun> => {
        const outcome: ProductOutcome = { product, status: 'failed', upserted: 0, skipped: [], error: null };
        try {
            const result = await fetchWithRetry(product, loadValidators(product));
            if (result.status === 'not-modified') {
                log.info(`${product}: source reports no update`);
                outcome.status = 'not-modified';
                return { outcome, fatal: null };
            }

            const parsed = parseProduct(result.body, product, { ...options.parser, fetchedAt });
            outcome.skipped = parsed.skipped;
            for (const skip of parsed.skipped) {
                log.info(`${product}: skipped record ${skip.index} (${skip.field}: ${skip.reason})`);
            }

            try {
                outcome.upserted = store.upsertMany(parsed.records);
            } catch (err) {
                if (err instanceof StoreError) outcome.upserted = err.written;
                throw err;
            }
            if (outcome.upserted === 0) {
                outcome.error = 'payload contained no usable records';
                log.error(`${product}: ${outcome.error}`);
                return { outcome, fatal: null };
            }

            store.setMetadata(METADATA_KEYS.validators(product), {
                etag: result.etag,
                lastModified: result.lastModified,
            });
            outcome.status = 'ok';
            log.info(`${product}: upserted ${outcome.upserted} records`);
            return { outcome, fatal: null };
        } catch (err) {
            outcome.error = errorMessage(err);
            log.error(`${product}: ingestion aborted: ${outcome.error}`);
            if (err instanceof StoreError) {
                return { outcome, fatal: err };
            }
            if (err instanceof FetchError || err instanceof ParseError) {
                return { outcome, fatal: null };
            }
            return { outcome, fatal: err instanceof Error ? err : new Error(outcome.error) };
        }
    };

    const runPurge = (now: Date, errors: string[]): PurgeResult | null => {
        try {
            return retention.runPurge(now);
        } catch (err) {
            errors.push(`purge: ${errorMessage(err)}`);
            log.error(`Purge failed: ${errorMessage(err)}`);
            return null;
        }
    };

    const runCycle = async (now = new Date()): Promise<CycleReport | null> => {
        if (running) {
            log.info('Cycle already running, skipping.');
            return null;
        }
        running = true;
        try {
            const startedAt = new Date().toISOString();
            log.info('Starting ingestion cycle...');

            const fetchedAt = now.toISOString();
            // Products are independent: each one's upserts start as soon as its own fetch and parse finish
            const [forecast, observation] = await Promise.all([
                ingestProduct('forecast', fetchedAt),
                ingestProduct('observation', fetchedAt),
            ]);

            const errors = [forecast, observation]
                .filter((run) => run.fatal !== null)
                .map((run) => `${run.outcome.product}: ${run.outcome.error}`);

            // Purge regardless of product failures; it only touches rows already stored
            const purged = runPurge(now, errors);

            const succeeded = (o: ProductOutcome) => o.status === 'not-modified' || (o.status === 'ok' && o.upserted > 0);
            const report: CycleReport = {
                started_at: startedAt,
                finished_at: new Date().toISOString(),
                forecast: forecast.outcome,
                observation: observation.outcome,
                purged,
                errors,
                ok: errors.length === 0 && succeeded(forecast.outcome) && succeeded(observation.outcome),
            };

            try {
                store.setMetadata(METADATA_KEYS.lastCycle, report);
            } catch (err) {
                report.errors.push(`report: ${errorMessage(err)}`);
                report.ok = false;
                log.error(`Could not store cycle report: ${errorMessage(err)}`);
            }

            log.info(`Cycle ${report.ok ? 'complete' : 'finished with failures'}.`);
            return report;
        } finally {
            running = false;
        }
    };

    return { runCycle, isRunning: () => running };
};
