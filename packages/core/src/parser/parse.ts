/**
 * Transaction parser: turns one chat message into one or more parse results.
 *
 * "50k taxi"              -> single result
 * "45k taxi, 15k snacks"  -> multi result, one segment per comma-separated part
 *
 * ARCHITECTURAL NOTE: Pure. No I/O, no console.*, never throws on input.
 */

import { CONFIDENCE_FUSION, DEFAULT_LEXICON, FLOW_THRESHOLDS } from '../types/index.js';
import type {
    AnyParseResult,
    CategoryCandidate,
    Lexicon,
    MultiParseResult,
    ParseResult,
} from '../types/index.js';
import { normalizeMessage } from '../utils/normalize.js';
import { roundTo } from '../utils/round.js';
import { countAmountTokens, extractAmount } from './amount.js';
import { classifyType } from './type.js';
import { matchCategory } from './category.js';
import { extractDescription } from './description.js';
import { applyTypeDiscount, scoreConfidence } from './confidence.js';

export interface TransactionParser {
    readonly lexicon: Lexicon;
    /** Parse a whole message, splitting comma-separated transactions. */
    parse(text: string, userCategories?: readonly CategoryCandidate[]): AnyParseResult;
    /** Parse text as exactly one transaction. */
    parseSegment(text: string, userCategories?: readonly CategoryCandidate[]): ParseResult;
}

/**
 * Create a parser bound to a lexicon.
 *
 * @param lexicon - Keyword tables (defaults to the bundled lexicon)
 */
export function createTransactionParser(lexicon: Lexicon = DEFAULT_LEXICON): TransactionParser {
    function parseSegment(text: string, userCategories: readonly CategoryCandidate[] = []): ParseResult {
        const normalized = normalizeMessage(text);

        // Type first: only categories of the detected direction are candidates
        const type = classifyType(normalized, lexicon);
        const candidates = userCategories.filter((candidate) => candidate.type === type.type);

        const amount = extractAmount(normalized);
        const category = matchCategory(normalized, candidates, lexicon);
        const description = extractDescription(text, amount.amount, lexicon);

        const hasAmount = amount.amount !== null;
        const hasCategory = category.category !== null;

        let confidence = scoreConfidence({
            hasAmount,
            amountConfidence: amount.confidence,
            hasCategory,
            categoryConfidence: category.confidence,
            matchedKeywordCount: category.matched_keywords.length,
            text: normalized,
        });
        if (hasAmount || hasCategory) {
            confidence = applyTypeDiscount(confidence, type.confidence);
        }

        return {
            is_multiple: false,
            amount: amount.amount,
            amount_confidence: amount.confidence,
            category: category.category,
            category_confidence: category.confidence,
            matched_keywords: category.matched_keywords,
            description,
            transaction_type: type.type,
            type_confidence: type.confidence,
            confidence,
            needs_clarification: confidence < FLOW_THRESHOLDS.CLARIFY_BELOW,
            raw_text: text,
        };
    }

    function parseMultiple(text: string, userCategories: readonly CategoryCandidate[]): MultiParseResult | null {
        const segments = text
            .split(',')
            .map((part) => part.trim())
            .filter((part) => part.length > 0)
            .map((part) => parseSegment(part, userCategories))
            .filter((segment) => segment.amount !== null);

        if (segments.length === 0) {
            return null;
        }

        const total = segments.reduce((sum, segment) => sum + segment.confidence, 0);
        return {
            is_multiple: true,
            segments,
            confidence: roundTo(total / segments.length, CONFIDENCE_FUSION.DECIMALS),
        };
    }

    function parse(text: string, userCategories: readonly CategoryCandidate[] = []): AnyParseResult {
        const trimmed = text.trim();

        if (trimmed.includes(',') && countAmountTokens(trimmed) >= 2) {
            const multiple = parseMultiple(trimmed, userCategories);
            if (multiple) {
                return multiple;
            }
        }

        return parseSegment(trimmed, userCategories);
    }

    return { lexicon, parse, parseSegment };
}

const defaultParser = createTransactionParser();

/**
 * Parse a message with the bundled lexicon.
 */
export function parseTransaction(
    text: string,
    userCategories: readonly CategoryCandidate[] = []
): AnyParseResult {
    return defaultParser.parse(text, userCategories);
}
