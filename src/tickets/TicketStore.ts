// src/tickets/TicketStore.ts
// Document store boundary for support tickets, and its SQLite implementation

import { SqliteDatabase } from '../db/database';
import { Citation, Classification } from '../llm/types';
import { PipelineStage } from '../pipeline/types';

export interface Ticket {
    id: string;
    subject: string;
    body: string;
    createdAt?: string;
}

export type TicketStatus = 'resolved' | 'routed' | 'failed' | 'cancelled';

export interface TicketResult {
    status: TicketStatus;
    classification: Classification | null;
    answer: string | null;
    citations: Citation[];
    routedTo: string | null;
    failedStage: PipelineStage | null;
    retryable: boolean;
    errors: string[];
}

/**
 * Everything the core needs from ticket storage
 */
export interface TicketStore {
    fetchUnprocessed(limit?: number): Promise<Ticket[]>;
    writeResult(id: string, result: TicketResult): Promise<void>;
}

interface TicketRow {
    id: string;
    subject: string;
    body: string;
    created_at: string;
}

interface ResultRow {
    ticket_id: string;
    status: string;
    result_json: string;
    processed_at: string;
}

/**
 * SqliteTicketStore - tickets and their pipeline results
 *
 * Failed and cancelled tickets stay unprocessed so the next batch picks them up again.
 */
export class SqliteTicketStore implements TicketStore {
    private db: SqliteDatabase;

    constructor(db: SqliteDatabase) {
        this.db = db;
    }

    async insertTickets(tickets: readonly Ticket[]): Promise<number> {
        const insert = this.db.prepare<[string, string, string, string | null]>(`
            INSERT OR IGNORE INTO tickets (id, subject, body, created_at)
            VALUES (?, ?, ?, COALESCE(?, CURRENT_TIMESTAMP))
        `);

        let inserted = 0;
        const insertAll = this.db.transaction(() => {
            for (const ticket of tickets) {
                inserted += insert.run(ticket.id, ticket.subject, ticket.body, ticket.createdAt ?? null).changes;
            }
        });

        insertAll();
        console.log(`[SqliteTicketStore] Inserted ${inserted} of ${tickets.length} tickets`);
        return inserted;
    }

    async fetchUnprocessed(limit?: number): Promise<Ticket[]> {
        const rows = this.db.prepare<[number], TicketRow>(`
            SELECT id, subject, body, created_at FROM tickets
            WHERE processed = 0
            ORDER BY created_at ASC, id ASC
            LIMIT ?
        `).all(limit ?? -1);

        return rows.map(row => ({
            id: row.id,
            subject: row.subject,
            body: row.body,
            createdAt: row.created_at
        }));
    }

    async writeResult(id: string, result: TicketResult): Promise<void> {
        const processed = result.status === 'resolved' || result.status === 'routed' ? 1 : 0;

        const write = this.db.transaction(() => {
            this.db.prepare(`
                INSERT INTO ticket_results (ticket_id, status, result_json, processed_at)
                VALUES (?, ?, ?, ?)
                ON CONFLICT(ticket_id) DO UPDATE SET
                    status = excluded.status,
                    result_json = excluded.result_json,
                    processed_at = excluded.processed_at
            `).run(id, result.status, JSON.stringify(result), new Date().toISOString());

            this.db.prepare('UPDATE tickets SET processed = ? WHERE id = ?').run(processed, id);
        });

        write();
    }

    async getResult(id: string): Promise<{ status: string; result: unknown; processedAt: string } | null> {
        const row = this.db.prepare<[string], ResultRow>(
            'SELECT ticket_id, status, result_json, processed_at FROM ticket_results WHERE ticket_id = ?'
        ).get(id);

        if (!row) return null;
        return { status: row.status, result: JSON.parse(row.result_json), processedAt: row.processed_at };
    }

    async countByStatus(): Promise<Record<string, number>> {
        const rows = this.db.prepare<[], { status: string; count: number }>(
            'SELECT status, COUNT(*) AS count FROM ticket_results GROUP BY status'
        ).all();

        const counts: Record<string, number> = {};
        for (const row of rows) {
            counts[row.status] = row.count;
        }
        return counts;
    }
}
