import type { Section } from '../analysis/types.js';

// Phrases that carry the default policy thresholds get a fixed bonus.
const BOOST_PHRASES: ReadonlyArray<readonly [phrase: string, bonus: number]> = [
    ['3 year', 2],
    ['1.5', 2],
];

export interface RetrievalResult {
    section: Section | null;
    score: number;
}

/**
 * Score a section against lower-cased query tokens: one point per token found
 * anywhere in the text, plus the boost of every boost phrase present.
 */
export function scoreSection(text: string, tokens: readonly string[]): number {
    const lower = text.toLowerCase();
    let score = tokens.filter((token) => lower.includes(token)).length;

    for (const [phrase, bonus] of BOOST_PHRASES) {
        if (lower.includes(phrase)) score += bonus;
    }
    return score;
}

/**
 * Find the section most relevant to a free-text query by keyword overlap.
 * The earliest section wins a tie.
 */
export function retrieveRelevantSection(
    sections: readonly Section[],
    query: string,
): RetrievalResult {
    const tokens = query.toLowerCase().split(/\s+/).filter(Boolean);

    let best: RetrievalResult = { section: null, score: 0 };
    let bestScore = -1;

    for (const section of sections) {
        const score = scoreSection(section.text, tokens);
        if (score > bestScore) {
            bestScore = score;
            best = { section, score };
        }
    }

    return best;
}
