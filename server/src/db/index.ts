import Database from 'better-sqlite3';
import { createLogger } from '../logger';

const log = createLogger('DB');

export type DatabaseHandle = Database.Database;

/**
 * Opens (creating if needed) the SQLite file and applies the schema.
 * Pass ':memory:' for a throwaway database.
 */
export const openDatabase = (dbPath: string): DatabaseHandle => {
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') {
        // Enable WAL mode so readers don't block the ingest writer
        db.pragma('journal_mode = WAL');
    }
    initDB(db);
    return db;
};

export const initDB = (db: DatabaseHandle) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS forecasts (
            station_id TEXT NOT NULL,
            valid_date TEXT NOT NULL,
            period_index INTEGER NOT NULL,
            issued_at TEXT NOT NULL,
            summary_text TEXT NOT NULL,
            min_temp INTEGER,
            max_temp INTEGER,
            rain_probability INTEGER,
            rain_amount_range TEXT,
            fetched_at TEXT NOT NULL,
            PRIMARY KEY (station_id, valid_date, period_index)
        );
        CREATE INDEX IF NOT EXISTS idx_forecasts_valid_date ON forecasts(valid_date);

        CREATE TABLE IF NOT EXISTS observations (
            station_id TEXT NOT NULL,
            observed_at TEXT NOT NULL,
            local_date TEXT NOT NULL,
            temperature REAL,
            humidity REAL,
            wind_speed REAL,
            wind_direction TEXT,
            rainfall_since_9am REAL,
            fetched_at TEXT NOT NULL,
            PRIMARY KEY (station_id, observed_at)
        );
        CREATE INDEX IF NOT EXISTS idx_observations_local_date ON observations(local_date);

        CREATE TABLE IF NOT EXISTS metadata (
            key TEXT PRIMARY KEY,
            value TEXT
        );
    `);
    log.info('Initialized SQLite database');
};
