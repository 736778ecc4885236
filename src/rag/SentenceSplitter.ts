// src/rag/SentenceSplitter.ts
// Deterministic sentence boundary detection over raw document text
//
// Heuristic, not grammatical: a sentence ends at . ! or ? (optionally followed
// by closing quotes/brackets) when whitespace and an uppercase letter follow,
// or at the end of the text. A blank line always ends a sentence, so headings
// and list items without punctuation become their own spans.

import { TextSpan } from './types';

// Title abbreviations that are followed by a capitalised name, not a new sentence
const TITLE_ABBREVIATIONS = new Set(['mr', 'mrs', 'ms', 'dr', 'prof', 'sr', 'jr', 'st']);

const TERMINATOR = /[.!?]+["'”’)\]]*(?=\s|$)|\n[ \t\r\f\v]*\n/g;
const UPPERCASE = /\p{Lu}/u;

function skipWhitespace(text: string, index: number): number {
    let i = index;
    while (i < text.length && /\s/.test(text[i])) i++;
    return i;
}

function trimEnd(text: string, start: number, end: number): number {
    let i = end;
    while (i > start && /\s/.test(text[i - 1])) i--;
    return i;
}

function isTitleAbbreviation(text: string, start: number, terminatorIndex: number, terminator: string): boolean {
    if (terminator !== '.') return false;
    const lastWord = /([\p{L}]+)$/u.exec(text.slice(start, terminatorIndex));
    return lastWord !== null && TITLE_ABBREVIATIONS.has(lastWord[1].toLowerCase());
}

/**
 * Split text into ordered, non-overlapping sentence spans.
 * Whitespace between spans belongs to no span. Empty input yields [].
 */
export function splitSentences(text: string): TextSpan[] {
    const spans: TextSpan[] = [];
    let start = skipWhitespace(text, 0);

    const push = (from: number, to: number) => {
        const end = trimEnd(text, from, to);
        if (end > from) {
            spans.push({ startOffset: from, endOffset: end, text: text.slice(from, end) });
        }
    };

    for (const match of text.matchAll(TERMINATOR)) {
        const index = match.index ?? 0;
        const isParagraphBreak = match[0].startsWith('\n');
        const end = isParagraphBreak ? index : index + match[0].length;
        if (end <= start) continue;

        if (!isParagraphBreak) {
            const next = skipWhitespace(text, end);
            if (next < text.length) {
                // Lowercase continuation ("e.g. the", "approx. ten") stays in the sentence
                if (!UPPERCASE.test(text[next])) continue;
                if (isTitleAbbreviation(text, start, index, match[0])) continue;
            }
        }

        push(start, end);
        start = skipWhitespace(text, end);
    }

    if (start < text.length) {
        push(start, text.length);
    }

    return spans;
}
