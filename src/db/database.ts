// src/db/database.ts
// SQLite bootstrap: opens the database and applies the schema

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type SqliteDatabase = Database.Database;

/**
 * Open (or create) the database at `filename` and run migrations.
 * Use ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): SqliteDatabase {
    try {
        console.log(`[Database] Opening database at ${filename}`);
        if (filename !== ':memory:') {
            const dir = path.dirname(filename);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
        }

        const db = new Database(filename);
        db.pragma('foreign_keys = ON');
        runMigrations(db);
        return db;
    } catch (error) {
        console.error('[Database] Failed to initialize database:', error);
        throw error;
    }
}

export function runMigrations(db: SqliteDatabase): void {
    // RAG: sentence-aligned chunks with embeddings, one row per chunk key
    const createChunksTable = `
        CREATE TABLE IF NOT EXISTS chunks (
            collection TEXT NOT NULL,
            source_id TEXT NOT NULL,
            start_offset INTEGER NOT NULL,
            end_offset INTEGER NOT NULL,
            text TEXT NOT NULL,
            size_chars INTEGER NOT NULL,
            url TEXT NOT NULL DEFAULT '',
            title TEXT NOT NULL DEFAULT '',
            embedding BLOB NOT NULL,
            updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
            PRIMARY KEY (collection, source_id, start_offset, end_offset)
        );
    `;

    const createTicketsTable = `
        CREATE TABLE IF NOT EXISTS tickets (
            id TEXT PRIMARY KEY,
            subject TEXT NOT NULL DEFAULT '',
            body TEXT NOT NULL,
            created_at TEXT DEFAULT CURRENT_TIMESTAMP,
            processed INTEGER NOT NULL DEFAULT 0
        );
    `;

    const createTicketResultsTable = `
        CREATE TABLE IF NOT EXISTS ticket_results (
            ticket_id TEXT PRIMARY KEY,
            status TEXT NOT NULL,
            result_json TEXT NOT NULL, -- serialized TicketResult
            processed_at TEXT NOT NULL,
            FOREIGN KEY(ticket_id) REFERENCES tickets(id) ON DELETE CASCADE
        );
    `;

    db.exec(createChunksTable);
    db.exec('CREATE INDEX IF NOT EXISTS idx_chunks_source ON chunks(collection, source_id);');
    db.exec(createTicketsTable);
    db.exec(createTicketResultsTable);
}
