import 'dotenv/config';
import cron from 'node-cron';
import { createApp } from './app';
import { createServices } from './bootstrap';
import { loadConfig } from './config';
import { ValidationError, errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('SERVER');

const config = loadConfig();
if (!cron.validate(config.ingestCron)) {
    throw new ValidationError('Invalid configuration', [`INGEST_CRON "${config.ingestCron}" is not a cron expression`]);
}

const services = createServices(config);
const app = createApp({
    store: services.store,
    comparison: services.comparison,
    pipeline: services.pipeline,
    timeZone: config.timeZone,
});

// --- Scheduler ---

const runScheduledCycle = () => {
    services.pipeline
        .runCycle()
        .then((report) => {
            if (report && !report.ok) log.error(`Scheduled cycle failed: ${report.errors.join('; ') || 'product failure'}`);
        })
        .catch((err) => log.error(`Scheduled cycle crashed: ${errorMessage(err)}`));
};

const task = cron.schedule(config.ingestCron, runScheduledCycle, { timezone: config.timeZone });

const server = app.listen(config.port, () => {
    log.info(`Running on http://localhost:${config.port}`);
});

const shutdown = () => {
    log.info('Shutting down...');
    task.stop();
    server.close(() => {
        services.db.close();
        process.exit(0);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
