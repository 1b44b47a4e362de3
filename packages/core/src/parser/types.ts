/**
 * Internal types for the parser pipeline.
 */

import type { TransactionType } from '../types/index.js';

/**
 * Amount read out of a message.
 */
export interface AmountExtraction {
    amount: number | null;
    confidence: number;
}

/**
 * Income/expense decision.
 */
export interface TypeClassification {
    type: TransactionType;
    confidence: number;
}

/**
 * Best category for a message.
 */
export interface CategoryMatch {
    category: string | null;
    confidence: number;
    matched_keywords: string[];
}

/**
 * Signals fused into the overall confidence.
 */
export interface ConfidenceInput {
    hasAmount: boolean;
    amountConfidence: number;
    hasCategory: boolean;
    categoryConfidence: number;
    matchedKeywordCount: number;
    /** Normalized message text, used for the word count. */
    text: string;
}
