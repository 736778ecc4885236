// src/tickets/TicketProcessor.ts
// Batch ticket resolution: one pipeline run per ticket through a bounded pool

import { describeError } from '../errors';
import { PipelineResult, RunOptions } from '../pipeline/types';
import { runWithConcurrency } from '../utils/concurrency';
import { Ticket, TicketResult, TicketStatus, TicketStore } from './TicketStore';

export interface QueryRunner {
    run(query: string, options?: RunOptions): Promise<PipelineResult>;
}

export interface ProcessOptions {
    concurrency?: number;
    limit?: number;
    signal?: AbortSignal;
}

export interface TicketOutcome {
    ticketId: string;
    status: TicketStatus;
    stored: boolean;
}

export interface BatchSummary {
    total: number;
    counts: Record<TicketStatus, number>;
    outcomes: TicketOutcome[];
}

export function ticketText(ticket: Ticket): string {
    const subject = ticket.subject.trim();
    return subject ? `${subject}\n\n${ticket.body.trim()}` : ticket.body.trim();
}

/**
 * Flatten a pipeline result into what gets stored for a ticket
 */
export function toTicketResult(result: PipelineResult): TicketResult {
    switch (result.status) {
        case 'done': {
            const { state } = result;
            return {
                status: state.routing ? 'routed' : 'resolved',
                classification: state.classification,
                answer: state.answer,
                citations: [...state.citations],
                routedTo: state.routing?.team ?? null,
                failedStage: null,
                retryable: false,
                errors: state.errors.map(e => `${e.stage}: ${e.message}`)
            };
        }
        case 'failed':
            return {
                status: 'failed',
                classification: result.state.classification,
                answer: null,
                citations: [],
                routedTo: null,
                failedStage: result.failedStage,
                retryable: result.retryable,
                errors: result.state.errors.map(e => `${e.stage}: ${e.message}`)
            };
        case 'cancelled':
            return {
                status: 'cancelled',
                classification: null,
                answer: null,
                citations: [],
                routedTo: null,
                failedStage: null,
                retryable: true,
                errors: result.errors.map(e => `${e.stage}: ${e.message}`)
            };
    }
}

/**
 * TicketProcessor - resolves every unprocessed ticket
 *
 * Runs are independent; the concurrency limit bounds how many are in flight
 * and the adapters' shared RateLimiter bounds how fast they call out.
 */
export class TicketProcessor {
    private store: TicketStore;
    private runner: QueryRunner;
    private defaultConcurrency: number;

    constructor(store: TicketStore, runner: QueryRunner, defaultConcurrency = 5) {
        this.store = store;
        this.runner = runner;
        this.defaultConcurrency = defaultConcurrency;
    }

    async processPending(options: ProcessOptions = {}): Promise<BatchSummary> {
        const tickets = await this.store.fetchUnprocessed(options.limit);
        const concurrency = options.concurrency ?? this.defaultConcurrency;
        console.log(`[TicketProcessor] Processing ${tickets.length} tickets (concurrency ${concurrency})`);

        const outcomes = await runWithConcurrency(tickets, concurrency, ticket => this.processTicket(ticket, options.signal));

        const counts: Record<TicketStatus, number> = { resolved: 0, routed: 0, failed: 0, cancelled: 0 };
        for (const outcome of outcomes) {
            counts[outcome.status]++;
        }

        console.log(`[TicketProcessor] Done: ${counts.resolved} resolved, ${counts.routed} routed, ${counts.failed} failed, ${counts.cancelled} cancelled`);
        return { total: tickets.length, counts, outcomes };
    }

    private async processTicket(ticket: Ticket, signal?: AbortSignal): Promise<TicketOutcome> {
        const result = toTicketResult(await this.runner.run(ticketText(ticket), { mode: 'route_ineligible', signal }));

        try {
            await this.store.writeResult(ticket.id, result);
            return { ticketId: ticket.id, status: result.status, stored: true };
        } catch (error) {
            console.error(`[TicketProcessor] Failed to store result for ticket ${ticket.id}:`, describeError(error));
            return { ticketId: ticket.id, status: result.status, stored: false };
        }
    }
}
