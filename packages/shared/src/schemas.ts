/**
 * Zod schemas for Chat Ledger data structures.
 *
 * IMPORTANT: Parse results carry amounts as plain numbers (they are estimates
 * read out of free text). Anything committed or totalled carries money as a
 * decimal string; convert to Decimal at computation boundaries.
 */

import { z } from 'zod';
import { TXN_ID } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Score in [0, 1].
 */
const unitScore = z.number().min(0).max(1);

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Transaction ID: 16-char hex, optionally with collision suffix.
 */
const txnId = z.string().regex(
    new RegExp(`^[0-9a-f]{${TXN_ID.LENGTH}}(-\\d{2})?$`),
    `Must be ${TXN_ID.LENGTH}-char hex, optionally with -NN suffix`
);

const categoryId = z.number().int().positive();

export const TransactionTypeSchema = z.enum(['expense', 'income']);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

// ============================================================================
// Categories
// ============================================================================

/**
 * A category the user can book against, supplied by the category store.
 */
export const CategoryCandidateSchema = z.object({
    id: categoryId,
    name: z.string().min(1),
    type: TransactionTypeSchema,
});

export type CategoryCandidate = z.infer<typeof CategoryCandidateSchema>;

// ============================================================================
// Parse Results
// ============================================================================

/**
 * Result of parsing one segment of a message.
 */
export const ParseResultSchema = z.object({
    is_multiple: z.literal(false),
    amount: z.number().positive().nullable(),
    amount_confidence: unitScore,
    category: z.string().nullable(),
    category_confidence: unitScore,
    matched_keywords: z.array(z.string()),
    description: z.string().min(1).max(100),
    transaction_type: TransactionTypeSchema,
    type_confidence: unitScore,
    confidence: unitScore,
    needs_clarification: z.boolean(),
    raw_text: z.string(),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

/**
 * Result of parsing a comma-separated message holding several transactions.
 */
export const MultiParseResultSchema = z.object({
    is_multiple: z.literal(true),
    segments: z.array(ParseResultSchema).min(1),
    confidence: unitScore,
});

export type MultiParseResult = z.infer<typeof MultiParseResultSchema>;

export const AnyParseResultSchema = z.discriminatedUnion('is_multiple', [
    ParseResultSchema,
    MultiParseResultSchema,
]);

export type AnyParseResult = z.infer<typeof AnyParseResultSchema>;

// ============================================================================
// Dialog State
// ============================================================================

/**
 * A parsed transaction waiting for the user to confirm its category.
 */
export const PendingTransactionSchema = z.object({
    /** Null when the message named no amount. */
    amount: z.number().positive().nullable(),
    description: z.string(),
    suggested_category: z.string().nullable(),
    transaction_type: TransactionTypeSchema,
    confidence: unitScore,
});

export type PendingTransaction = z.infer<typeof PendingTransactionSchema>;

/**
 * Per-session dialog state. IDLE sessions are not stored at all.
 */
export const FlowSessionSchema = z.object({
    state: z.literal('awaiting_category'),
    queue: z.array(PendingTransactionSchema).min(1),
});

export type FlowSession = z.infer<typeof FlowSessionSchema>;

// ============================================================================
// Ledger & Budgets
// ============================================================================

export const PaymentMethodSchema = z.enum(['cash', 'bank', 'card']);

export type PaymentMethod = z.infer<typeof PaymentMethodSchema>;

/**
 * What the flow asks the ledger to record.
 */
export const CommitInputSchema = z.object({
    user_id: z.string().min(1),
    amount: decimalString,
    category_id: categoryId,
    transaction_type: TransactionTypeSchema,
    description: z.string(),
    payment_method: PaymentMethodSchema,
});

export type CommitInput = z.infer<typeof CommitInputSchema>;

/**
 * A transaction the ledger has recorded.
 */
export const CommittedTransactionSchema = CommitInputSchema.extend({
    txn_id: txnId,
    created_at: z.string().datetime(),
});

export type CommittedTransaction = z.infer<typeof CommittedTransactionSchema>;

export const LedgerFileSchema = z.array(CommittedTransactionSchema);

/**
 * Spending against a category budget at a point in time.
 */
export const BudgetStatusSchema = z.object({
    budget_amount: decimalString,
    spent: decimalString,
    percentage: z.number().min(0),
    is_exceeded: z.boolean(),
    is_warning: z.boolean(),
});

export type BudgetStatus = z.infer<typeof BudgetStatusSchema>;

/**
 * Configured monthly budget for one category.
 */
export const BudgetSchema = z.object({
    category_id: categoryId,
    amount: z.union([z.number().positive(), decimalString]).transform(String),
});

export type Budget = z.infer<typeof BudgetSchema>;

// ============================================================================
// Lexicon
// ============================================================================

const keywordList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

export const CategoryKeywordsSchema = z.object({
    tag: z.string().min(1),
    weight: z.number().min(1).max(3),
    primary: keywordList,
    secondary: keywordList.default([]),
});

export type CategoryKeywords = z.infer<typeof CategoryKeywordsSchema>;

export const IndicatorSetSchema = z.object({
    strong: keywordList,
    weak: keywordList.default([]),
});

export type IndicatorSet = z.infer<typeof IndicatorSetSchema>;

export const ScreeningSchema = z.object({
    casual_words: keywordList,
    code_patterns: z.array(z.string().min(1)),
    symbol_characters: z.string().min(1),
});

export type Screening = z.infer<typeof ScreeningSchema>;

/**
 * Keyword tables driving type classification, category scoring,
 * description cleanup and input screening.
 */
export const LexiconSchema = z.object({
    categories: z.array(CategoryKeywordsSchema).min(1),
    income_indicators: IndicatorSetSchema,
    expense_indicators: IndicatorSetSchema,
    connectors: keywordList,
    screening: ScreeningSchema,
});

export type Lexicon = z.infer<typeof LexiconSchema>;

// ============================================================================
// Workspace Config
// ============================================================================

/**
 * config/settings.yaml
 */
export const SettingsSchema = z.object({
    user_id: z.string().min(1).default('local'),
    currency: z.string().regex(/^[A-Z]{3}$/, 'Must be a 3-letter currency code').default('UZS'),
    session_ttl_minutes: z.number().int().positive().default(10),
    /** Custom lexicon file, relative to the workspace root. */
    lexicon: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * config/categories.yaml: a list, or { categories: [...] }.
 */
export const CategoriesFileSchema = z
    .union([
        z.array(CategoryCandidateSchema),
        z.object({ categories: z.array(CategoryCandidateSchema) }).transform((file) => file.categories),
    ])
    .refine(
        (categories) => new Set(categories.map((c) => c.id)).size === categories.length,
        'Category ids must be unique'
    );

/**
 * config/budgets.yaml: a list, or { budgets: [...] }.
 */
export const BudgetsFileSchema = z
    .union([
        z.array(BudgetSchema),
        z.object({ budgets: z.array(BudgetSchema) }).transform((file) => file.budgets),
    ])
    .refine(
        (budgets) => new Set(budgets.map((b) => b.category_id)).size === budgets.length,
        'One budget per category'
    );
