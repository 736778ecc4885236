// src/llm/TicketClassifier.ts
// Closed-vocabulary classification (topic tags, sentiment, priority) via a JSON completion

import { z } from 'zod';
import { Taxonomy, tagNames } from '../config/taxonomy';
import { MalformedOutputError, describeError } from '../errors';
import { extractJsonObject } from './postProcessor';
import { buildClassificationPrompt } from './prompts';
import { Classification, Completer, MODE_CONFIGS } from './types';

const confidence = z.coerce.number().min(0).max(1);

const ClassificationSchema = z.object({
    topic_tags: z.array(z.string().trim()).min(1),
    sentiment: z.string().trim(),
    priority: z.string().trim(),
    confidence_scores: z.object({
        topic: confidence,
        sentiment: confidence,
        priority: confidence
    })
});

const ResponseSchema = z.union([
    z.object({ classification: ClassificationSchema }).transform(response => response.classification),
    ClassificationSchema
]);

export interface ClassificationOutcome {
    classification: Classification;
    degraded: boolean;
    error?: MalformedOutputError;
}

/**
 * TicketClassifier - maps free text onto the taxonomy
 *
 * Output that cannot be parsed, or that names a label outside the
 * vocabularies, degrades to the taxonomy fallback with zero confidence.
 * Provider failures are not caught here.
 */
export class TicketClassifier {
    private completer: Completer;
    private taxonomy: Taxonomy;
    private ragEligibleTopics: Set<string>;
    private config = MODE_CONFIGS.classification;

    constructor(completer: Completer, taxonomy: Taxonomy, ragEligibleTopics: readonly string[]) {
        this.completer = completer;
        this.taxonomy = taxonomy;
        this.ragEligibleTopics = new Set(ragEligibleTopics);
    }

    async classify(text: string): Promise<Classification> {
        const outcome = await this.classifyWithDiagnostics(text);
        return outcome.classification;
    }

    async classifyWithDiagnostics(text: string): Promise<ClassificationOutcome> {
        const raw = await this.completer.complete(buildClassificationPrompt(text, this.taxonomy), this.config);

        try {
            return { classification: this.parse(raw), degraded: false };
        } catch (error) {
            if (!(error instanceof MalformedOutputError)) {
                throw error;
            }
            console.warn(`[TicketClassifier] Using default classification: ${error.message}`);
            return { classification: this.fallbackClassification(), degraded: true, error };
        }
    }

    /**
     * Validate raw model output against the closed vocabularies
     */
    parse(raw: string): Classification {
        let json: unknown;
        try {
            json = JSON.parse(extractJsonObject(raw));
        } catch (error) {
            throw new MalformedOutputError(`Classification is not valid JSON: ${describeError(error)}`, raw, error);
        }

        const parsed = ResponseSchema.safeParse(json);
        if (!parsed.success) {
            const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
            throw new MalformedOutputError(`Classification has the wrong shape: ${detail}`, raw);
        }

        const result = parsed.data;
        const topicTags = [...new Set(result.topic_tags)];
        this.assertInVocabulary('topic', topicTags, tagNames(this.taxonomy.topics), raw);
        this.assertInVocabulary('sentiment', [result.sentiment], tagNames(this.taxonomy.sentiments), raw);
        this.assertInVocabulary('priority', [result.priority], tagNames(this.taxonomy.priorities), raw);

        return {
            topic: this.primaryTopic(topicTags),
            topicTags,
            sentiment: result.sentiment,
            priority: result.priority,
            confidenceTopic: result.confidence_scores.topic,
            confidenceSentiment: result.confidence_scores.sentiment,
            confidencePriority: result.confidence_scores.priority
        };
    }

    /**
     * First answerable tag wins; otherwise the first tag given
     */
    primaryTopic(topicTags: readonly string[]): string {
        return topicTags.find(tag => this.ragEligibleTopics.has(tag)) ?? topicTags[0] ?? this.taxonomy.fallback.topic;
    }

    fallbackClassification(): Classification {
        const { topic, sentiment, priority } = this.taxonomy.fallback;
        return {
            topic,
            topicTags: [topic],
            sentiment,
            priority,
            confidenceTopic: 0,
            confidenceSentiment: 0,
            confidencePriority: 0
        };
    }

    private assertInVocabulary(category: string, labels: readonly string[], vocabulary: readonly string[], raw: string): void {
        const unknown = labels.filter(label => !vocabulary.includes(label));
        if (unknown.length > 0) {
            throw new MalformedOutputError(`Unknown ${category} label(s): ${unknown.map(label => `"${label}"`).join(', ')}`, raw);
        }
    }
}
