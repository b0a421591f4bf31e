import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { PersistenceUnavailableError, TranslationError } from '../../domain/errors/TranslationErrors';

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS translations (
        source_text          TEXT NOT NULL,
        source_lang          TEXT NOT NULL,
        target_lang          TEXT NOT NULL,
        translated_text      TEXT NOT NULL,
        detected_source_lang TEXT NOT NULL,
        provider             TEXT,
        translated_at        TEXT NOT NULL,
        created_at           TEXT NOT NULL,
        PRIMARY KEY (source_text, source_lang, target_lang)
    );

    CREATE INDEX IF NOT EXISTS idx_translations_created
        ON translations(created_at DESC);

    CREATE TABLE IF NOT EXISTS chats (
        chat_id           TEXT PRIMARY KEY,
        enabled_languages TEXT NOT NULL,
        custom_flags      TEXT NOT NULL DEFAULT '{}',
        created_at        TEXT NOT NULL,
        updated_at        TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS translation_log (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id     TEXT NOT NULL,
        message_id  TEXT,
        source_lang TEXT,
        target_lang TEXT NOT NULL,
        provider    TEXT NOT NULL,
        success     INTEGER NOT NULL,
        timestamp   TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_translation_log_chat
        ON translation_log(chat_id, timestamp DESC);

    CREATE INDEX IF NOT EXISTS idx_translation_log_success
        ON translation_log(chat_id, success, timestamp DESC);

    CREATE TABLE IF NOT EXISTS api_usage (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        provider   TEXT NOT NULL,
        chars_used INTEGER NOT NULL,
        date       TEXT NOT NULL,
        timestamp  TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_api_usage_date
        ON api_usage(provider, date);
`;

/**
 * Owns the SQLite connection shared by the repositories and creates the
 * schema on open. Use ':memory:' for an in-process database.
 *
 * A database that cannot be opened is not fatal: every operation reports
 * PersistenceUnavailableError and the next one tries to open it again.
 */
export class SqliteDatabase {
    private connection: Database.Database | null = null;
    private closed = false;

    constructor(readonly databasePath: string) {
        try {
            this.open();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Database] Could not open ${databasePath}, running without persistence: ${message}`);
        }
    }

    get isOpen(): boolean {
        return this.connection?.open ?? false;
    }

    close(): void {
        this.closed = true;
        if (this.connection?.open) {
            this.connection.close();
        }
        this.connection = null;
    }

    /**
     * Runs a database operation, reporting driver failures as
     * PersistenceUnavailableError. Domain errors pass through.
     */
    run<T>(operation: string, fn: (db: Database.Database) => T): T {
        try {
            return fn(this.open());
        } catch (error) {
            if (error instanceof TranslationError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Database] ${operation} failed: ${message}`);
            throw new PersistenceUnavailableError(`${operation} failed: ${message}`, error);
        }
    }

    private open(): Database.Database {
        if (this.closed) {
            throw new PersistenceUnavailableError('Database is closed');
        }
        if (this.connection) {
            return this.connection;
        }

        if (this.databasePath !== ':memory:') {
            const dir = path.dirname(path.resolve(this.databasePath));
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
        }

        const db = new Database(this.databasePath);
        try {
            if (this.databasePath !== ':memory:') {
                db.pragma('journal_mode = WAL');
            }
            db.exec(SCHEMA);
        } catch (error) {
            db.close();
            throw error;
        }

        this.connection = db;
        console.log(`[Database] Opened ${this.databasePath}`);
        return db;
    }
}
