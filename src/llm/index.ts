// src/llm/index.ts
// Central export for completion, classification and answer modules

export { CompletionClient } from './CompletionClient';
export type { CompletionClientOptions } from './CompletionClient';
export {
    GeminiCompletionProvider,
    GroqCompletionProvider,
    DEFAULT_GEMINI_MODEL,
    DEFAULT_GROQ_MODEL,
    toGroqProviderError
} from './providers';
export { TicketClassifier } from './TicketClassifier';
export type { ClassificationOutcome } from './TicketClassifier';
export { ResponseAssembler, insufficientInformation } from './ResponseAssembler';
export { stripPrefixes, extractJsonObject, validateCitations, sanitizeSourceUrl } from './postProcessor';
export type { CitationCheck } from './postProcessor';
export {
    INSUFFICIENT_INFORMATION_ANSWER,
    buildClassificationPrompt,
    buildAnswerPrompt,
    buildRoutingMessage,
    formatPassages
} from './prompts';
export { MODE_CONFIGS } from './types';
export type {
    GenerationConfig,
    CompletionProvider,
    Completer,
    Classification,
    Citation,
    AssembledAnswer
} from './types';
