// src/llm/providers.ts
// Concrete completion providers: Gemini (@google/genai) and Groq (groq-sdk)

import { GoogleGenAI } from '@google/genai';
import Groq from 'groq-sdk';
import { CopilotError, TransientProviderError, describeError } from '../errors';
import { toGeminiProviderError } from '../rag/EmbeddingClient';
import { classifyProviderStatus } from '../utils/backoff';
import { CompletionProvider, GenerationConfig } from './types';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';

export class GeminiCompletionProvider implements CompletionProvider {
    readonly name = 'gemini';
    private client: GoogleGenAI;
    private modelName: string;

    constructor(apiKey: string, modelName: string = DEFAULT_GEMINI_MODEL) {
        this.client = new GoogleGenAI({ apiKey });
        this.modelName = modelName;
        console.log(`[GeminiCompletionProvider] Initialized with model: ${modelName}`);
    }

    async complete(prompt: string, config: GenerationConfig): Promise<string> {
        try {
            const response = await this.client.models.generateContent({
                model: this.modelName,
                contents: prompt,
                config: {
                    maxOutputTokens: config.maxOutputTokens,
                    temperature: config.temperature,
                    topP: config.topP,
                    responseMimeType: config.json ? 'application/json' : 'text/plain',
                },
            });

            // Extract text handling potential missing top-level text property
            const rawText = response.text
                || response.candidates?.[0]?.content?.parts?.[0]?.text
                || '';
            return rawText.trim();
        } catch (error) {
            throw toGeminiProviderError(error, `Gemini ${this.modelName}`);
        }
    }
}

export class GroqCompletionProvider implements CompletionProvider {
    readonly name = 'groq';
    private client: Groq;
    private modelName: string;

    constructor(apiKey: string, modelName: string = DEFAULT_GROQ_MODEL) {
        this.client = new Groq({ apiKey });
        this.modelName = modelName;
        console.log(`[GroqCompletionProvider] Initialized with model: ${modelName}`);
    }

    async complete(prompt: string, config: GenerationConfig): Promise<string> {
        try {
            const completion = await this.client.chat.completions.create({
                model: this.modelName,
                messages: [{ role: 'user', content: prompt }],
                temperature: config.temperature,
                top_p: config.topP,
                max_tokens: config.maxOutputTokens,
                response_format: config.json ? { type: 'json_object' } : undefined,
            });

            return completion.choices[0]?.message?.content?.trim() ?? '';
        } catch (error) {
            throw toGroqProviderError(error, `Groq ${this.modelName}`);
        }
    }
}

/**
 * Map groq-sdk errors onto the provider error taxonomy.
 * Connection errors carry no status and count as transient.
 */
export function toGroqProviderError(error: unknown, operation: string): CopilotError {
    if (error instanceof CopilotError) return error;
    if (error instanceof Groq.APIError) {
        return classifyProviderStatus(error.status, `${operation}: ${error.message}`, error);
    }
    return new TransientProviderError(`${operation}: ${describeError(error)}`, undefined, error);
}
