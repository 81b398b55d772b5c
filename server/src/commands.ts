import { parseArgs } from 'util';
import type { Services } from './bootstrap';
import type { AppConfig } from './config';
import { localDateString } from './lib/time';
import type { CycleReport } from './types';

const USAGE = `Usage:
  precis-obs-tracker ingest                          run one ingestion cycle
  precis-obs-tracker compare [--from D] [--to D] [--station ID]
                                                     print forecast/observation pairs (dates YYYY-MM-DD)
  precis-obs-tracker purge                           apply the retention window only
  precis-obs-tracker stations                        list stations with stored data`;

export const formatReport = (report: CycleReport): string => {
    const lines = [`Cycle ${report.ok ? 'OK' : 'FAILED'} (${report.started_at} -> ${report.finished_at})`];
    for (const outcome of [report.forecast, report.observation]) {
        lines.push(
            `  ${outcome.product}: ${outcome.status}, ${outcome.upserted} upserted, ${outcome.skipped.length} skipped` +
                (outcome.error ? ` - ${outcome.error}` : '')
        );
        for (const skip of outcome.skipped) {
            lines.push(`    skipped #${skip.index} ${skip.field}: ${skip.reason}`);
        }
    }
    lines.push(
        report.purged
            ? `  purged: ${report.purged.forecast_removed} forecasts, ${report.purged.observation_removed} observations`
            : '  purged: not run'
    );
    for (const error of report.errors) {
        lines.push(`  error: ${error}`);
    }
    return lines.join('\n');
};

/** Runs one CLI command and returns the process exit code. */
export async function runCommand(argv: string[], config: AppConfig, services: Services): Promise<number> {
    const { positionals, values } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            from: { type: 'string' },
            to: { type: 'string' },
            station: { type: 'string' },
        },
    });

    switch (positionals[0]) {
        case 'ingest': {
            const report = await services.pipeline.runCycle();
            if (!report) return 1;
            console.log(formatReport(report));
            return report.ok ? 0 : 1;
        }
        case 'compare': {
            const today = localDateString(new Date(), config.timeZone);
            const from = values.from ?? values.to ?? today;
            const to = values.to ?? from;
            const rows = services.comparison.compare({ from, to }, values.station ?? null);
            console.log(JSON.stringify(rows, null, 2));
            return 0;
        }
        case 'purge': {
            const result = services.retention.runPurge();
            console.log(JSON.stringify(result));
            return 0;
        }
        case 'stations': {
            console.log(services.store.listStations().join('\n'));
            return 0;
        }
        default:
            console.error(USAGE);
            return 2;
    }
}
