#!/usr/bin/env node
import 'dotenv/config';
import { createServices } from './bootstrap';
import { runCommand } from './commands';
import { loadConfig } from './config';
import { ValidationError, errorMessage } from './errors';
import { createLogger, setLogger } from './logger';

const log = createLogger('CLI');

async function main() {
    // Logs go to stderr so command output on stdout stays machine-readable
    setLogger((message) => console.error(message));

    const config = loadConfig();
    const services = createServices(config);
    try {
        process.exitCode = await runCommand(process.argv.slice(2), config, services);
    } finally {
        services.db.close();
    }
}

main().catch((err) => {
    log.error(err instanceof ValidationError ? err.message : `Failed: ${errorMessage(err)}`);
    process.exitCode = 1;
});
