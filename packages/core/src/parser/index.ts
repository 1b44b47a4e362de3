/**
 * Parser module: free-text message to structured transaction.
 */

export { createTransactionParser, parseTransaction } from './parse.js';
export type { TransactionParser } from './parse.js';
export { extractAmount, countAmountTokens, stripAmounts } from './amount.js';
export { classifyType } from './type.js';
export { matchCategory, scoreToConfidence } from './category.js';
export { extractDescription } from './description.js';
export { scoreConfidence, applyTypeDiscount } from './confidence.js';
export type { AmountExtraction, TypeClassification, CategoryMatch, ConfidenceInput } from './types.js';
