import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { loadTaxonomy, routeTopic, tagNames } from './taxonomy';

describe('loadTaxonomy', () => {
    it('loads the bundled vocabularies', () => {
        const taxonomy = loadTaxonomy();

        expect(tagNames(taxonomy.sentiments)).toEqual(['Frustrated', 'Angry', 'Curious', 'Neutral']);
        expect(tagNames(taxonomy.priorities)).toEqual(['P0 (High)', 'P1 (Medium)', 'P2 (Low)']);
        expect(tagNames(taxonomy.topics)).toContain('API/SDK');
        expect(taxonomy.fallback).toEqual({ topic: 'Other', sentiment: 'Neutral', priority: 'P2 (Low)' });
    });

    it('rejects a fallback label outside its vocabulary', () => {
        const raw = {
            topics: [{ name: 'How-to' }],
            sentiments: [{ name: 'Neutral' }],
            priorities: [{ name: 'Low' }],
            fallback: { topic: 'Other', sentiment: 'Neutral', priority: 'Low' },
            routing: { defaultTeam: 'Support' }
        };

        expect(() => loadTaxonomy(raw)).toThrow('Fallback topic "Other" is not in the topic vocabulary');
    });

    it('rejects a definition with the wrong shape', () => {
        expect(() => loadTaxonomy({ topics: [] })).toThrow(ConfigurationError);
    });
});

describe('routeTopic', () => {
    const taxonomy = loadTaxonomy();

    it('uses the team mapped to the topic', () => {
        expect(routeTopic(taxonomy, 'Connector')).toBe('Data Engineering Team');
        expect(routeTopic(taxonomy, 'Sensitive data')).toBe('Security Team');
    });

    it('falls back to the default team', () => {
        expect(routeTopic(taxonomy, 'How-to')).toBe('General Support');
    });
});
