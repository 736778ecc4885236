// src/llm/ResponseAssembler.ts
// Grounded answer with numbered citations, or the fixed insufficient-information answer

import { RankedPassage } from '../rag/types';
import { sanitizeSourceUrl, stripPrefixes, validateCitations } from './postProcessor';
import { INSUFFICIENT_INFORMATION_ANSWER, buildAnswerPrompt, buildRoutingMessage } from './prompts';
import { AssembledAnswer, Citation, Classification, Completer, MODE_CONFIGS } from './types';

const SNIPPET_LENGTH = 300;

function toSnippet(text: string): string {
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length <= SNIPPET_LENGTH ? flat : `${flat.slice(0, SNIPPET_LENGTH).trimEnd()}...`;
}

export function insufficientInformation(): AssembledAnswer {
    return { answerText: INSUFFICIENT_INFORMATION_ANSWER, citations: [], insufficientInformation: true };
}

export class ResponseAssembler {
    private completer: Completer;
    private config = MODE_CONFIGS.answer;

    constructor(completer: Completer) {
        this.completer = completer;
    }

    /**
     * No passages means no model call. Citation numbers in the answer body are
     * checked against the passage list and dangling ones removed.
     */
    async assemble(query: string, passages: readonly RankedPassage[], classification: Classification): Promise<AssembledAnswer> {
        if (passages.length === 0) {
            console.log('[ResponseAssembler] No passages, returning insufficient-information answer');
            return insufficientInformation();
        }

        const raw = await this.completer.complete(buildAnswerPrompt(query, passages, classification.topic), this.config);
        const { text, used } = validateCitations(stripPrefixes(raw), passages.length);

        if (text === '') {
            console.warn('[ResponseAssembler] Empty answer from model, returning insufficient-information answer');
            return insufficientInformation();
        }

        const citations: Citation[] = passages.map((passage, i) => ({
            number: i + 1,
            title: passage.title,
            url: sanitizeSourceUrl(passage.sourceUrl),
            snippet: toSnippet(passage.snippet),
            score: passage.score,
            used: used.has(i + 1)
        }));

        console.log(`[ResponseAssembler] Answer assembled with ${used.size}/${citations.length} citations used`);
        return { answerText: text, citations, insufficientInformation: false };
    }

    /**
     * Answer for a ticket that goes to a team instead of the knowledge base
     */
    route(classification: Classification, team: string): AssembledAnswer {
        return {
            answerText: buildRoutingMessage(classification.topic, team, classification.priority, classification.sentiment),
            citations: [],
            insufficientInformation: false
        };
    }
}
