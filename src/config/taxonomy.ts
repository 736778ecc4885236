// src/config/taxonomy.ts
// Closed classification vocabularies and the team routing map

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import defaultTaxonomy from './taxonomy.json';

const TagSchema = z.object({
    name: z.string().min(1),
    description: z.string().default('')
});

const TaxonomySchema = z.object({
    topics: z.array(TagSchema).min(1),
    sentiments: z.array(TagSchema).min(1),
    priorities: z.array(TagSchema).min(1),
    fallback: z.object({
        topic: z.string(),
        sentiment: z.string(),
        priority: z.string()
    }),
    routing: z.object({
        defaultTeam: z.string().min(1),
        teams: z.record(z.string(), z.string()).default({})
    })
});

export type TaxonomyTag = z.infer<typeof TagSchema>;
export type Taxonomy = z.infer<typeof TaxonomySchema>;

/**
 * Parse and cross-check a taxonomy definition.
 * Fallback labels must belong to their own vocabulary.
 */
export function loadTaxonomy(raw: unknown = defaultTaxonomy): Taxonomy {
    const parsed = TaxonomySchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid taxonomy: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }

    const taxonomy = parsed.data;
    const checks: [string, string, TaxonomyTag[]][] = [
        ['topic', taxonomy.fallback.topic, taxonomy.topics],
        ['sentiment', taxonomy.fallback.sentiment, taxonomy.sentiments],
        ['priority', taxonomy.fallback.priority, taxonomy.priorities]
    ];
    for (const [category, label, tags] of checks) {
        if (!tags.some(tag => tag.name === label)) {
            throw new ConfigurationError(`Fallback ${category} "${label}" is not in the ${category} vocabulary`);
        }
    }

    return taxonomy;
}

export function tagNames(tags: readonly TaxonomyTag[]): string[] {
    return tags.map(tag => tag.name);
}

export function routeTopic(taxonomy: Taxonomy, topic: string): string {
    return taxonomy.routing.teams[topic] ?? taxonomy.routing.defaultTeam;
}
