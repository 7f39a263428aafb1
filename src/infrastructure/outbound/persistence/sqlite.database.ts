import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const IN_MEMORY = ':memory:';

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS prison_events (
        id TEXT PRIMARY KEY,
        event_type TEXT NOT NULL,
        event_date TEXT,
        facility TEXT,
        region TEXT,
        count INTEGER,
        description TEXT NOT NULL DEFAULT '',
        source_url TEXT NOT NULL,
        confidence REAL NOT NULL DEFAULT 1,
        is_aggregate INTEGER NOT NULL DEFAULT 0,
        extracted_at TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS prison_events_source_key
        ON prison_events (source_url, event_type, COALESCE(event_date, ''), COALESCE(facility, ''));

    CREATE INDEX IF NOT EXISTS prison_events_event_date ON prison_events (event_date);

    CREATE TABLE IF NOT EXISTS facility_snapshots (
        id TEXT PRIMARY KEY,
        facility TEXT NOT NULL,
        region TEXT,
        capacity INTEGER,
        inmates INTEGER,
        occupancy_rate REAL,
        snapshot_date TEXT NOT NULL,
        source_url TEXT NOT NULL,
        extracted_at TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS facility_snapshots_source_key
        ON facility_snapshots (facility, snapshot_date, source_url);
`;

/**
 * SQLite connection holding the incident and capacity tables
 */
export class SqliteDatabase {
    private connection: Database.Database | null = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly databasePath: string,
    ) {}

    async connect(): Promise<void> {
        if (this.connection) return;

        this.logger.info('Opening SQLite database', { databasePath: this.databasePath });

        if (this.databasePath !== IN_MEMORY) {
            mkdirSync(dirname(this.databasePath), { recursive: true });
        }

        const connection = new Database(this.databasePath);
        connection.pragma('journal_mode = WAL');
        connection.exec(SCHEMA);

        this.connection = connection;
    }

    async disconnect(): Promise<void> {
        this.connection?.close();
        this.connection = null;
    }

    getConnection(): Database.Database {
        if (!this.connection) {
            throw new Error('SQLite database is not connected');
        }
        return this.connection;
    }
}
