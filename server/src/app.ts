import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { METADATA_KEYS } from './constants';
import type { RecordStore } from './db/recordStore';
import { ValidationError, errorMessage } from './errors';
import { localDateString } from './lib/time';
import { createLogger } from './logger';
import type { ComparisonQuery } from './services/comparisonService';
import type { IngestionPipeline } from './services/ingestService';

const log = createLogger('SERVER');

export interface AppDeps {
    store: RecordStore;
    comparison: ComparisonQuery;
    pipeline: IngestionPipeline;
    timeZone: string;
}

const ComparisonParams = z.object({
    from: z.string().optional(),
    to: z.string().optional(),
    station: z.string().trim().min(1).optional(),
});

export const createApp = ({ store, comparison, pipeline, timeZone }: AppDeps) => {
    const app = express();

    app.use(cors());

    // --- API Routes ---

    // Defaults to today (station calendar) when no range is given
    app.get('/api/comparison', (req, res) => {
        const params = ComparisonParams.safeParse(req.query);
        if (!params.success) {
            throw new ValidationError(
                'Invalid query',
                params.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
            );
        }
        const today = localDateString(new Date(), timeZone);
        const from = params.data.from ?? params.data.to ?? today;
        const to = params.data.to ?? from;
        res.json(comparison.compare({ from, to }, params.data.station ?? null));
    });

    app.get('/api/stations', (req, res) => {
        res.json(store.listStations());
    });

    app.get('/api/status', (req, res) => {
        res.json({
            status: 'online',
            running: pipeline.isRunning(),
            last_cycle: store.getMetadata(METADATA_KEYS.lastCycle),
            server_time: Date.now(),
        });
    });

    app.post('/api/trigger-update', (req, res) => {
        if (pipeline.isRunning()) {
            res.status(409).json({ message: 'Update cycle already running' });
            return;
        }
        log.info('Triggering update...');
        // Run in background to avoid timeout
        pipeline.runCycle().catch((err) => log.error(`Update failed: ${errorMessage(err)}`));
        res.status(202).json({ message: 'Update cycle started' });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ValidationError) {
            res.status(400).json({ error: err.message });
            return;
        }
        log.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);
        res.status(500).json({ error: errorMessage(err) });
    });

    return app;
};
