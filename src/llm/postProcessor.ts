// src/llm/postProcessor.ts
// Post-processing applied to raw model output before it leaves the LLM layer

/**
 * Prefixes to strip from start of responses
 */
const PREFIXES = [
    "Here is the answer:",
    "Final answer:",
    "Answer:",
    "Response:",
    "Reply:",
];

const LOCAL_URL = /^https?:\/\/(localhost|127\.0\.0\.1|0\.0\.0\.0)(:\d+)?(\/|$)/i;

// [1], [1, 2] or [1-3] (hyphen or en dash), with the horizontal whitespace in front of it
const CITATION_ITEM = String.raw`\d+(?:\s*[-\u2013]\s*\d+)?`;
const CITATION_REFERENCE = new RegExp(String.raw`([ \t]*)\[(${CITATION_ITEM}(?:\s*,\s*${CITATION_ITEM})*)\]`, 'g');

/**
 * Strip label prefixes ("Answer:", ...) and markdown bold variants of them
 */
export function stripPrefixes(text: string): string {
    let result = text.trim();
    for (const prefix of PREFIXES) {
        const bold = `**${prefix}**`;
        if (result.toLowerCase().startsWith(bold.toLowerCase())) {
            result = result.substring(bold.length).trim();
        } else if (result.toLowerCase().startsWith(prefix.toLowerCase())) {
            result = result.substring(prefix.length).trim();
        }
    }
    return result;
}

/**
 * Remove markdown code fences around a JSON payload and cut to the outermost object
 */
export function extractJsonObject(text: string): string {
    let result = text.trim();
    result = result.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/, '').trim();

    if (!result.startsWith('{')) {
        const start = result.indexOf('{');
        const end = result.lastIndexOf('}');
        if (start !== -1 && end > start) {
            result = result.slice(start, end + 1);
        }
    }
    return result;
}

export interface CitationCheck {
    text: string;
    used: Set<number>;
}

/**
 * Numbers of one bracket item ("2" or "1-3") that fall within 1..citationCount
 */
function expandCitationItem(item: string, citationCount: number): number[] {
    const [from, to = from] = item.split(/[-\u2013]/).map(n => Number(n.trim()));
    const low = Math.max(Math.min(from, to), 1);
    const high = Math.min(Math.max(from, to), citationCount);
    const numbers: number[] = [];
    for (let n = low; n <= high; n++) numbers.push(n);
    return numbers;
}

/**
 * Keep only citation numbers in 1..citationCount, with ranges expanded.
 * References to anything else are dropped from the text; a bracket left
 * empty disappears entirely.
 */
export function validateCitations(text: string, citationCount: number): CitationCheck {
    const used = new Set<number>();

    const cleaned = text.replace(CITATION_REFERENCE, (_match, leading: string, numbers: string) => {
        const valid = [...new Set(numbers.split(',').flatMap(item => expandCitationItem(item, citationCount)))];

        if (valid.length === 0) return '';
        valid.forEach(n => used.add(n));
        return `${leading}[${valid.join(', ')}]`;
    });

    return { text: cleaned.trim(), used };
}

/**
 * Local development URLs are never shown to users
 */
export function sanitizeSourceUrl(url: string): string {
    return LOCAL_URL.test(url.trim()) ? '' : url.trim();
}
