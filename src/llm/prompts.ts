// src/llm/prompts.ts
// Prompt templates for classification and grounded answers

import { Taxonomy, TaxonomyTag } from '../config/taxonomy';
import { RankedPassage } from '../rag/types';

// ==========================================
// CLASSIFICATION
// ==========================================

function formatTags(tags: readonly TaxonomyTag[]): string {
    return tags
        .map(tag => tag.description ? `- "${tag.name}": ${tag.description}` : `- "${tag.name}"`)
        .join('\n');
}

/**
 * Classification prompt. The model must answer with a single JSON object.
 */
export function buildClassificationPrompt(text: string, taxonomy: Taxonomy): string {
    return `You are a support ticket analyst. Classify the customer message below.

INSTRUCTIONS:
1. Read the message carefully to understand the user's issue.
2. Classify it into three categories: Topic, Sentiment and Priority.
3. For each category you MUST choose only from the listed tags, spelled exactly as shown.
4. Give a confidence score between 0.0 and 1.0 for each category.
5. Output a single valid JSON object and nothing else. No markdown, no explanation.

MESSAGE:
---
${text}
---

topic_tags (one or more, most relevant first):
${formatTags(taxonomy.topics)}

sentiment (exactly one, the customer's emotional tone):
${formatTags(taxonomy.sentiments)}

priority (exactly one, based on urgency and business impact):
${formatTags(taxonomy.priorities)}

REQUIRED JSON FORMAT:
{
  "classification": {
    "topic_tags": ["<one or more topic tags>"],
    "sentiment": "<one sentiment tag>",
    "priority": "<one priority tag>",
    "confidence_scores": { "topic": <float>, "sentiment": <float>, "priority": <float> }
  }
}`;
}

// ==========================================
// GROUNDED ANSWER
// ==========================================

export const INSUFFICIENT_INFORMATION_ANSWER =
    "I couldn't find a specific answer to this in the documentation. Try rephrasing the question with more detail, or contact the support team for help.";

/**
 * Passages are numbered from 1 in rank order; the model cites them as [n]
 */
export function formatPassages(passages: readonly RankedPassage[]): string {
    return passages
        .map((passage, i) => `[${i + 1}] ${passage.title || 'Untitled'}${passage.sourceUrl ? ` (${passage.sourceUrl})` : ''}\n${passage.snippet}`)
        .join('\n\n');
}

export function buildAnswerPrompt(query: string, passages: readonly RankedPassage[], topic: string): string {
    return `You are a helpful, friendly customer support assistant.
Answer the user's question using ONLY the numbered documentation passages below.

CRITICAL RULES:
- Base every statement strictly on the passages. Do not add outside knowledge.
- Cite the passage a statement comes from with its number in square brackets, e.g. [1] or [2].
- Only use numbers of passages listed below.
- If the passages do not contain enough information, say clearly that you could not find a specific answer in the documentation. Do not guess.
- Keep the tone professional and clear. Use short paragraphs or lists where they help.
- Do not start with a label such as "Answer:".

QUESTION TOPIC: ${topic}

PASSAGES:
${formatPassages(passages)}

USER QUESTION: ${query}`;
}

// ==========================================
// ROUTING
// ==========================================

export function buildRoutingMessage(topic: string, team: string, priority: string, sentiment: string): string {
    return `This ticket has been classified as a '${topic}' issue and routed to our ${team}.

What happens next:
- The ${team} will review your ticket and follow up directly if more information is needed.

Summary:
- Topic: ${topic}
- Priority: ${priority}
- Sentiment: ${sentiment}`;
}
