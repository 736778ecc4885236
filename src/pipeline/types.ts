// src/pipeline/types.ts
// Pipeline states, per-run record and run results

import { ErrorCode } from '../errors';
import { AssembledAnswer, Citation, Classification } from '../llm/types';
import { ClassificationOutcome } from '../llm/TicketClassifier';
import { RankedPassage } from '../rag/types';

export enum PipelineStage {
    RECEIVED = 'RECEIVED',
    CLASSIFIED = 'CLASSIFIED',
    RETRIEVED = 'RETRIEVED',
    ANSWERED = 'ANSWERED',
    DONE = 'DONE',
    FAILED = 'FAILED',
}

/**
 * always_answer: every query goes through retrieval (chat).
 * route_ineligible: topics outside the answerable set are routed to a team (tickets).
 */
export type AnswerMode = 'always_answer' | 'route_ineligible';

export interface StageError {
    stage: PipelineStage;        // transition target that failed
    code: ErrorCode | 'UNKNOWN';
    message: string;
    fatal: boolean;
}

export interface RoutingDecision {
    topic: string;
    team: string;
}

/**
 * Per-run record. Every transition returns a new frozen state.
 */
export interface PipelineState {
    readonly stage: PipelineStage;
    readonly inputQuery: string;
    readonly classification: Classification | null;
    readonly retrievedPassages: readonly RankedPassage[];
    readonly answer: string | null;
    readonly citations: readonly Citation[];
    readonly routing: RoutingDecision | null;
    readonly errors: readonly StageError[];
}

export interface CompletedRun {
    status: 'done';
    state: PipelineState;
}

export interface FailedRun {
    status: 'failed';
    failedStage: PipelineStage;
    lastCompletedStage: PipelineStage;
    retryable: boolean;
    error: StageError;
    state: PipelineState;
}

/**
 * Cancelled runs carry no answer
 */
export interface CancelledRun {
    status: 'cancelled';
    lastCompletedStage: PipelineStage;
    inputQuery: string;
    errors: readonly StageError[];
}

export type PipelineResult = CompletedRun | FailedRun | CancelledRun;

export interface RunOptions {
    mode?: AnswerMode;
    signal?: AbortSignal;
}

// Stage contracts the orchestrator depends on

export interface ClassificationStage {
    classifyWithDiagnostics(text: string): Promise<ClassificationOutcome>;
    fallbackClassification(): Classification;
}

export interface RetrievalStage {
    retrieve(query: string, classification: Classification | null): Promise<RankedPassage[]>;
}

export interface AnswerStage {
    assemble(query: string, passages: readonly RankedPassage[], classification: Classification): Promise<AssembledAnswer>;
    route(classification: Classification, team: string): AssembledAnswer;
}
