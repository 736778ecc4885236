// src/pipeline/index.ts

export { PipelineOrchestrator, InterCallDelay } from './PipelineOrchestrator';
export type { OrchestratorOptions } from './PipelineOrchestrator';
export { PipelineStage } from './types';
export type {
    AnswerMode,
    StageError,
    RoutingDecision,
    PipelineState,
    CompletedRun,
    FailedRun,
    CancelledRun,
    PipelineResult,
    RunOptions,
    ClassificationStage,
    RetrievalStage,
    AnswerStage
} from './types';
