// src/tickets/index.ts

export { SqliteTicketStore } from './TicketStore';
export type { Ticket, TicketStatus, TicketResult, TicketStore } from './TicketStore';
export { TicketProcessor, toTicketResult, ticketText } from './TicketProcessor';
export type { QueryRunner, ProcessOptions, TicketOutcome, BatchSummary } from './TicketProcessor';
