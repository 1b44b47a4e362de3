/**
 * Category scoring against the built-in keyword table and the user's own categories.
 *
 * Built-in categories score 1.0 x weight per primary keyword and 0.5 x weight
 * per secondary keyword found in the message; secondary hits are reported with
 * a trailing "*". A user category whose full name
 * appears in the message wins outright; one whose longer name words appear
 * scores 2.5. The highest score wins, earliest entry first on ties.
 */

import { CATEGORY_SCORING } from '../types/index.js';
import type { CategoryCandidate, Lexicon } from '../types/index.js';
import { normalizeMessage } from '../utils/normalize.js';
import type { CategoryMatch } from './types.js';

interface ScoredCategory {
    score: number;
    keywords: string[];
}

/**
 * Map a raw score onto the confidence bands.
 */
export function scoreToConfidence(score: number): number {
    for (const band of CATEGORY_SCORING.BANDS) {
        if (score >= band.min) {
            return band.confidence;
        }
    }
    return CATEGORY_SCORING.WEAK_CONFIDENCE;
}

/**
 * Find the best category for a message.
 *
 * @param text - Message text (any casing)
 * @param userCategories - The user's categories, in display order
 * @param lexicon - Built-in keyword table
 * @returns Category tag or user category name, its confidence and the keywords that hit
 */
export function matchCategory(
    text: string,
    userCategories: readonly CategoryCandidate[],
    lexicon: Lexicon
): CategoryMatch {
    const normalized = normalizeMessage(text);
    // Map keeps insertion order, which is the tie-break order
    const scores = new Map<string, ScoredCategory>();

    for (const entry of lexicon.categories) {
        let score = 0;
        const keywords: string[] = [];

        for (const keyword of entry.primary) {
            if (normalized.includes(keyword)) {
                score += CATEGORY_SCORING.PRIMARY_HIT * entry.weight;
                keywords.push(keyword);
            }
        }
        for (const keyword of entry.secondary) {
            if (normalized.includes(keyword)) {
                score += CATEGORY_SCORING.SECONDARY_HIT * entry.weight;
                keywords.push(`${keyword}*`);
            }
        }

        if (score > 0) {
            scores.set(entry.tag, { score, keywords });
        }
    }

    for (const candidate of userCategories) {
        const name = normalizeMessage(candidate.name);

        if (normalized.includes(name)) {
            return {
                category: candidate.name,
                confidence: CATEGORY_SCORING.USER_EXACT_CONFIDENCE,
                matched_keywords: [name],
            };
        }

        const words = name.split(' ').filter((word) => word.length >= CATEGORY_SCORING.USER_WORD_MIN_LENGTH);
        for (const word of words) {
            if (!normalized.includes(word)) continue;
            const existing = scores.get(candidate.name);
            if (!existing || existing.score < CATEGORY_SCORING.USER_WORD_SCORE) {
                scores.set(candidate.name, { score: CATEGORY_SCORING.USER_WORD_SCORE, keywords: [word] });
            }
        }
    }

    let best: [string, ScoredCategory] | null = null;
    for (const entry of scores) {
        if (best === null || entry[1].score > best[1].score) {
            best = entry;
        }
    }

    if (best === null) {
        return { category: null, confidence: 0, matched_keywords: [] };
    }

    const [category, { score, keywords }] = best;
    return {
        category,
        confidence: scoreToConfidence(score),
        matched_keywords: keywords,
    };
}
