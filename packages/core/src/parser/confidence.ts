/**
 * Overall confidence fusion.
 *
 * Bands:
 * - nothing found:       0.1
 * - one of amount/category: max(0.3, sub-score x 0.6)
 * - both:                mean of the two, boosted for several keywords
 *                        and for short messages, rounded to 3 places
 */

import { CONFIDENCE_FUSION } from '../types/index.js';
import { countWords } from '../utils/normalize.js';
import { roundTo } from '../utils/round.js';
import type { ConfidenceInput } from './types.js';

function partialConfidence(subScore: number): number {
    return roundTo(
        Math.max(CONFIDENCE_FUSION.PARTIAL_FLOOR, subScore * CONFIDENCE_FUSION.PARTIAL_FACTOR),
        CONFIDENCE_FUSION.DECIMALS
    );
}

/**
 * Fuse amount and category sub-scores into one confidence in [0, 1].
 */
export function scoreConfidence(input: ConfidenceInput): number {
    const { hasAmount, amountConfidence, hasCategory, categoryConfidence, matchedKeywordCount } = input;

    if (!hasAmount && !hasCategory) {
        return CONFIDENCE_FUSION.NOTHING_FOUND;
    }

    if (!hasAmount) {
        return partialConfidence(categoryConfidence);
    }

    if (!hasCategory) {
        return partialConfidence(amountConfidence);
    }

    let confidence = amountConfidence * 0.5 + categoryConfidence * 0.5;

    if (matchedKeywordCount >= CONFIDENCE_FUSION.MULTI_KEYWORD_MIN) {
        confidence = Math.min(CONFIDENCE_FUSION.MULTI_KEYWORD_CAP, confidence * CONFIDENCE_FUSION.MULTI_KEYWORD_BOOST);
    }

    if (countWords(input.text) <= CONFIDENCE_FUSION.SHORT_TEXT_MAX_WORDS && matchedKeywordCount >= 1) {
        confidence = Math.min(CONFIDENCE_FUSION.SHORT_TEXT_CAP, confidence * CONFIDENCE_FUSION.SHORT_TEXT_BOOST);
    }

    return roundTo(confidence, CONFIDENCE_FUSION.DECIMALS);
}

/**
 * Discount a confidence when the income/expense call was unsure.
 */
export function applyTypeDiscount(confidence: number, typeConfidence: number): number {
    if (typeConfidence >= CONFIDENCE_FUSION.TYPE_AMBIGUOUS_BELOW) {
        return confidence;
    }
    return roundTo(confidence * CONFIDENCE_FUSION.TYPE_AMBIGUITY_DISCOUNT, CONFIDENCE_FUSION.DECIMALS);
}
