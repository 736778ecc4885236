// src/pipeline/PipelineOrchestrator.ts
// RECEIVED -> CLASSIFIED -> RETRIEVED -> ANSWERED -> DONE, or FAILED

import { Taxonomy, routeTopic } from '../config/taxonomy';
import { CopilotError, describeError, isFatalProviderError, isRetryAdvisable } from '../errors';
import { insufficientInformation } from '../llm/ResponseAssembler';
import { AssembledAnswer, Classification } from '../llm/types';
import { RankedPassage } from '../rag/types';
import { Clock, systemClock } from '../utils/clock';
import {
    AnswerMode,
    AnswerStage,
    CancelledRun,
    ClassificationStage,
    FailedRun,
    PipelineResult,
    PipelineStage,
    PipelineState,
    RetrievalStage,
    RunOptions,
    StageError
} from './types';

export interface OrchestratorOptions {
    taxonomy: Taxonomy;
    ragEligibleTopics: readonly string[];
    interCallDelayMs: number;
    defaultMode?: AnswerMode;
    clock?: Clock;
}

/**
 * Minimum gap between the end of one external-model call and the start of
 * the next within a single run. One instance per run.
 */
export class InterCallDelay {
    private lastCallEnd: number | null = null;

    constructor(private readonly clock: Clock, private readonly delayMs: number) {}

    async beforeCall(): Promise<number> {
        if (this.lastCallEnd === null) return 0;
        const wait = this.delayMs - (this.clock.now() - this.lastCallEnd);
        if (wait > 0) {
            await this.clock.sleep(wait);
            return wait;
        }
        return 0;
    }

    afterCall(): void {
        this.lastCallEnd = this.clock.now();
    }

    async around<T>(call: () => Promise<T>): Promise<T> {
        await this.beforeCall();
        try {
            return await call();
        } finally {
            this.afterCall();
        }
    }
}

function initialState(inputQuery: string): PipelineState {
    return Object.freeze({
        stage: PipelineStage.RECEIVED,
        inputQuery,
        classification: null,
        retrievedPassages: [],
        answer: null,
        citations: [],
        routing: null,
        errors: []
    });
}

function advance(state: PipelineState, patch: Partial<PipelineState>): PipelineState {
    return Object.freeze({ ...state, ...patch });
}

function toStageError(stage: PipelineStage, error: unknown, fatal: boolean): StageError {
    return {
        stage,
        code: error instanceof CopilotError ? error.code : 'UNKNOWN',
        message: describeError(error),
        fatal
    };
}

/**
 * PipelineOrchestrator - one query, stages strictly in sequence
 *
 * Classification degrades to the default labels, retrieval degrades to no
 * passages. Only a permanent provider error or an exhausted retry budget
 * moves the run to FAILED. Cancellation is checked before every transition.
 */
export class PipelineOrchestrator {
    private classifier: ClassificationStage;
    private retriever: RetrievalStage;
    private assembler: AnswerStage;
    private taxonomy: Taxonomy;
    private eligibleTopics: Set<string>;
    private interCallDelayMs: number;
    private defaultMode: AnswerMode;
    private clock: Clock;

    constructor(
        classifier: ClassificationStage,
        retriever: RetrievalStage,
        assembler: AnswerStage,
        options: OrchestratorOptions
    ) {
        this.classifier = classifier;
        this.retriever = retriever;
        this.assembler = assembler;
        this.taxonomy = options.taxonomy;
        this.eligibleTopics = new Set(options.ragEligibleTopics);
        this.interCallDelayMs = options.interCallDelayMs;
        this.defaultMode = options.defaultMode ?? 'always_answer';
        this.clock = options.clock ?? systemClock;
    }

    async run(query: string, options: RunOptions = {}): Promise<PipelineResult> {
        const mode = options.mode ?? this.defaultMode;
        const pacing = new InterCallDelay(this.clock, this.interCallDelayMs);
        let state = initialState(query);

        // RECEIVED -> CLASSIFIED
        if (options.signal?.aborted) return this.cancelled(state);
        let classification: Classification;
        let classificationError: unknown = null;
        try {
            const outcome = await pacing.around(() => this.classifier.classifyWithDiagnostics(query));
            classification = outcome.classification;
            classificationError = outcome.error ?? null;
        } catch (error) {
            if (isFatalProviderError(error)) {
                return this.failed(state, PipelineStage.CLASSIFIED, error);
            }
            console.warn(`[PipelineOrchestrator] Classification degraded to defaults: ${describeError(error)}`);
            classification = this.classifier.fallbackClassification();
            classificationError = error;
        }
        state = advance(state, {
            stage: PipelineStage.CLASSIFIED,
            classification,
            errors: classificationError === null
                ? state.errors
                : [...state.errors, toStageError(PipelineStage.CLASSIFIED, classificationError, false)]
        });
        console.log(`[PipelineOrchestrator] CLASSIFIED: ${classification.topic} / ${classification.sentiment} / ${classification.priority}`);

        // CLASSIFIED -> RETRIEVED
        if (options.signal?.aborted) return this.cancelled(state);
        if (mode === 'route_ineligible' && !this.eligibleTopics.has(classification.topic)) {
            const team = routeTopic(this.taxonomy, classification.topic);
            state = advance(state, {
                stage: PipelineStage.RETRIEVED,
                retrievedPassages: [],
                routing: { topic: classification.topic, team }
            });
            console.log(`[PipelineOrchestrator] RETRIEVED: skipped, routing to ${team}`);
        } else {
            let passages: RankedPassage[] = [];
            let stageError: StageError | null = null;
            try {
                passages = await pacing.around(() => this.retriever.retrieve(query, classification));
            } catch (error) {
                if (isFatalProviderError(error)) {
                    return this.failed(state, PipelineStage.RETRIEVED, error);
                }
                console.warn(`[PipelineOrchestrator] Retrieval degraded to no passages: ${describeError(error)}`);
                stageError = toStageError(PipelineStage.RETRIEVED, error, false);
            }
            state = advance(state, {
                stage: PipelineStage.RETRIEVED,
                retrievedPassages: passages,
                errors: stageError ? [...state.errors, stageError] : state.errors
            });
            console.log(`[PipelineOrchestrator] RETRIEVED: ${passages.length} passages`);
        }

        // RETRIEVED -> ANSWERED
        if (options.signal?.aborted) return this.cancelled(state);
        let answer: AssembledAnswer;
        if (state.routing) {
            answer = this.assembler.route(classification, state.routing.team);
        } else {
            const passages = state.retrievedPassages;
            try {
                answer = passages.length > 0
                    ? await pacing.around(() => this.assembler.assemble(query, passages, classification))
                    : await this.assembler.assemble(query, passages, classification);
            } catch (error) {
                if (isFatalProviderError(error)) {
                    return this.failed(state, PipelineStage.ANSWERED, error);
                }
                console.warn(`[PipelineOrchestrator] Answer degraded to insufficient information: ${describeError(error)}`);
                state = advance(state, { errors: [...state.errors, toStageError(PipelineStage.ANSWERED, error, false)] });
                answer = insufficientInformation();
            }
        }
        state = advance(state, {
            stage: PipelineStage.ANSWERED,
            answer: answer.answerText,
            citations: answer.citations
        });

        // ANSWERED -> DONE
        if (options.signal?.aborted) return this.cancelled(state);
        state = advance(state, { stage: PipelineStage.DONE });
        return { status: 'done', state };
    }

    private failed(state: PipelineState, failedStage: PipelineStage, error: unknown): FailedRun {
        const stageError = toStageError(failedStage, error, true);
        console.error(`[PipelineOrchestrator] FAILED during ${failedStage}: ${stageError.message}`);
        return {
            status: 'failed',
            failedStage,
            lastCompletedStage: state.stage,
            retryable: isRetryAdvisable(error),
            error: stageError,
            state: advance(state, { stage: PipelineStage.FAILED, errors: [...state.errors, stageError] })
        };
    }

    private cancelled(state: PipelineState): CancelledRun {
        console.log(`[PipelineOrchestrator] Cancelled after ${state.stage}`);
        return {
            status: 'cancelled',
            lastCompletedStage: state.stage,
            inputQuery: state.inputQuery,
            errors: state.errors
        };
    }
}
