/**
 * Amount extraction.
 *
 * Two patterns, tried in order:
 * 1. Currency symbol then number: "$50", "€ 12,5"
 * 2. Bare number with an optional "thousand" suffix: "50k", "50 к", "2.5 thousand"
 *
 * Only the first match counts. "spent 50k on taxi and 25k on lunch" yields 50000.
 */

import { Decimal } from 'decimal.js';
import { AMOUNT_CONFIDENCE } from '../types/index.js';
import type { AmountExtraction } from './types.js';

const CURRENCY_SOURCE = '[$€£₽]\\s*(\\d+(?:[.,]\\d+)?)';

// Boundaries are start, whitespace or comma on both sides, so "5k," and "a,5k" both count.
// "тысяч" must come before "т" and "thousand" before "thous".
const AMOUNT_SOURCE = '(?:^|\\s|,)(\\d+(?:[.,]\\d+)?)\\s*(k|к|thousand|тысяч|т|thous)?(?:\\s|,|$)';

const CURRENCY_PATTERN = new RegExp(CURRENCY_SOURCE);
const AMOUNT_PATTERN = new RegExp(AMOUNT_SOURCE, 'i');
const CURRENCY_PATTERN_ALL = new RegExp(CURRENCY_SOURCE, 'g');
const AMOUNT_PATTERN_ALL = new RegExp(AMOUNT_SOURCE, 'gi');

const NO_AMOUNT: AmountExtraction = { amount: null, confidence: 0 };

/**
 * Read "12,5" or "12.5" as a Decimal.
 */
function toDecimal(numeral: string): Decimal {
    return new Decimal(numeral.replace(',', '.'));
}

/**
 * Extract the monetary amount from a message.
 *
 * @param text - Message text (any casing)
 * @returns Amount in base units with its confidence; null amount when none found
 */
export function extractAmount(text: string): AmountExtraction {
    const currency = CURRENCY_PATTERN.exec(text);
    if (currency) {
        const amount = toDecimal(currency[1]);
        if (amount.greaterThan(0)) {
            return { amount: amount.toNumber(), confidence: AMOUNT_CONFIDENCE.CURRENCY_SYMBOL };
        }
    }

    const match = AMOUNT_PATTERN.exec(text);
    if (!match) {
        return NO_AMOUNT;
    }

    let amount = toDecimal(match[1]);
    if (match[2] !== undefined) {
        amount = amount.times(AMOUNT_CONFIDENCE.THOUSAND_MULTIPLIER);
    }
    if (amount.lessThanOrEqualTo(0)) {
        return NO_AMOUNT;
    }

    const confidence = amount.greaterThanOrEqualTo(AMOUNT_CONFIDENCE.SMALL_NUMBER_BELOW)
        ? AMOUNT_CONFIDENCE.CLEAR_NUMBER
        : AMOUNT_CONFIDENCE.SMALL_NUMBER;

    return { amount: amount.toNumber(), confidence };
}

/**
 * Count amount-like tokens (bare numbers and currency amounts).
 * Used to tell "45k taxi, 15k snacks" apart from "taxi, metro 5k".
 */
export function countAmountTokens(text: string): number {
    const bare = Array.from(text.matchAll(AMOUNT_PATTERN_ALL)).length;
    const symbol = Array.from(text.matchAll(CURRENCY_PATTERN_ALL)).length;
    return bare + symbol;
}

/**
 * Blank out every amount-like token, leaving a space in its place.
 */
export function stripAmounts(text: string): string {
    return text
        .replace(AMOUNT_PATTERN_ALL, ' ')
        .replace(CURRENCY_PATTERN_ALL, ' ');
}
