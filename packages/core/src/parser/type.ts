/**
 * Income vs. expense classification from lexical indicators.
 *
 * Messages with no indicator at all are expenses at confidence 0.6.
 */

import { TYPE_SCORING } from '../types/index.js';
import type { IndicatorSet, Lexicon } from '../types/index.js';
import { normalizeMessage } from '../utils/normalize.js';
import { roundTo } from '../utils/round.js';
import type { TypeClassification } from './types.js';

function countHits(text: string, keywords: readonly string[]): number {
    return keywords.filter((keyword) => text.includes(keyword)).length;
}

/**
 * Weighted indicator score: 2 per strong hit, 0.5 per weak hit.
 */
function indicatorScore(text: string, indicators: IndicatorSet): number {
    return countHits(text, indicators.strong) * TYPE_SCORING.STRONG_WEIGHT
        + countHits(text, indicators.weak) * TYPE_SCORING.WEAK_WEIGHT;
}

/**
 * Decide whether a message records income or an expense.
 *
 * @param text - Message text (any casing)
 * @param lexicon - Indicator keyword sets
 */
export function classifyType(text: string, lexicon: Lexicon): TypeClassification {
    const normalized = normalizeMessage(text);
    const income = indicatorScore(normalized, lexicon.income_indicators);
    const expense = indicatorScore(normalized, lexicon.expense_indicators);

    if (income > 0 && income > expense) {
        return {
            type: 'income',
            confidence: roundTo(
                Math.min(TYPE_SCORING.INCOME_CAP, TYPE_SCORING.INCOME_BASE + TYPE_SCORING.STEP * income),
                3
            ),
        };
    }

    if (expense > 0) {
        return {
            type: 'expense',
            confidence: roundTo(
                Math.min(TYPE_SCORING.EXPENSE_CAP, TYPE_SCORING.EXPENSE_BASE + TYPE_SCORING.STEP * expense),
                3
            ),
        };
    }

    return { type: 'expense', confidence: TYPE_SCORING.DEFAULT_CONFIDENCE };
}
