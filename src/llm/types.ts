// src/llm/types.ts
// Shared types for the completion layer

/**
 * Generation configuration for completion calls
 */
export interface GenerationConfig {
    maxOutputTokens: number;
    temperature: number;
    topP: number;
    json: boolean;        // ask the provider for a JSON object
}

/**
 * Mode-specific generation settings
 */
export const MODE_CONFIGS = {
    classification: {
        maxOutputTokens: 1024,
        temperature: 0.1,
        topP: 0.8,
        json: true,
    } satisfies GenerationConfig,

    answer: {
        maxOutputTokens: 2048,
        temperature: 0.25,
        topP: 0.85,
        json: false,
    } satisfies GenerationConfig,
} as const;

/**
 * Completion provider boundary: one request, no retry.
 * Failures are thrown as TransientProviderError or PermanentProviderError.
 */
export interface CompletionProvider {
    readonly name: string;
    complete(prompt: string, config: GenerationConfig): Promise<string>;
}

/**
 * Anything that turns a prompt into text (CompletionClient in production, fakes in tests)
 */
export interface Completer {
    complete(prompt: string, config: GenerationConfig): Promise<string>;
}

/**
 * Closed-vocabulary classification of a query or ticket.
 * `topic` is the primary topic derived from `topicTags`.
 */
export interface Classification {
    topic: string;
    topicTags: string[];
    sentiment: string;
    priority: string;
    confidenceTopic: number;
    confidenceSentiment: number;
    confidencePriority: number;
}

export interface Citation {
    number: number;       // 1-based, in passage rank order
    title: string;
    url: string;          // blank for local/dev URLs
    snippet: string;
    score: number;
    used: boolean;        // referenced by the answer body
}

export interface AssembledAnswer {
    answerText: string;
    citations: Citation[];
    insufficientInformation: boolean;
}
