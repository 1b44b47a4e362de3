/**
 * Description extraction: what is left of a message once the amount,
 * category keywords and expense verbs are taken out.
 *
 * "bought new shoes at the mall 300k" -> "new at the mall"
 */

import { DESCRIPTION } from '../types/index.js';
import type { Lexicon } from '../types/index.js';
import { escapeRegExp, wholeWordPattern } from '../utils/regex.js';
import { stripAmounts } from './amount.js';

interface CompiledDescriptionPatterns {
    keywords: RegExp[];
    leadingConnector: RegExp | null;
    edgePunctuation: RegExp;
}

const compiled = new WeakMap<Lexicon, CompiledDescriptionPatterns>();

function compile(lexicon: Lexicon): CompiledDescriptionPatterns {
    const cached = compiled.get(lexicon);
    if (cached) return cached;

    const categoryKeywords = lexicon.categories
        .flatMap((entry) => [...entry.primary, ...entry.secondary])
        .filter((keyword) => keyword.length >= DESCRIPTION.MIN_STRIP_KEYWORD_LENGTH);
    const expenseVerbs = [
        ...lexicon.expense_indicators.strong,
        ...lexicon.expense_indicators.weak,
    ];

    const connectors = lexicon.connectors.map(escapeRegExp).join('|');
    const punctuation = escapeRegExp(DESCRIPTION.EDGE_PUNCTUATION);

    const patterns: CompiledDescriptionPatterns = {
        keywords: [...categoryKeywords, ...expenseVerbs].map(wholeWordPattern),
        leadingConnector: connectors ? new RegExp(`^(?:${connectors})\\s+`, 'iu') : null,
        edgePunctuation: new RegExp(`^[${punctuation}]+|[${punctuation}]+$`, 'g'),
    };
    compiled.set(lexicon, patterns);
    return patterns;
}

/**
 * Derive a short human-readable description from a message.
 *
 * @param text - Original message text (casing preserved in the output)
 * @param amount - Extracted amount; amount tokens are only stripped when one was found
 * @param lexicon - Keyword tables to strip
 * @returns Cleaned description, at most 100 characters, "Transaction" when nothing is left
 */
export function extractDescription(text: string, amount: number | null, lexicon: Lexicon): string {
    const patterns = compile(lexicon);

    let result = amount !== null ? stripAmounts(text) : text;

    for (const pattern of patterns.keywords) {
        result = result.replace(pattern, '');
    }

    result = result.replace(/\s+/g, ' ').trim();
    if (patterns.leadingConnector) {
        result = result.replace(patterns.leadingConnector, '');
    }
    result = result.replace(patterns.edgePunctuation, '').trim();

    if (result.length > DESCRIPTION.MAX_LENGTH) {
        result = result.slice(0, DESCRIPTION.MAX_LENGTH - DESCRIPTION.ELLIPSIS.length) + DESCRIPTION.ELLIPSIS;
    }

    return result || DESCRIPTION.PLACEHOLDER;
}
