/**
 * Constants for Chat Ledger.
 * Thresholds here were tuned together: changing one shifts which messages
 * auto-record, which ask for a category, and which are rejected.
 */

/**
 * Flow decision thresholds on the overall parse confidence.
 */
export const FLOW_THRESHOLDS = {
    /** Below this a single message is rejected as unintelligible. */
    REJECT_BELOW: 0.4,
    /** Below this a parse result is flagged needs_clarification. */
    CLARIFY_BELOW: 0.5,
    /** At or above this (with a resolved category) a transaction is committed unattended. */
    AUTO_CREATE_AT: 0.75,
} as const;

/**
 * Amount extraction confidences.
 */
export const AMOUNT_CONFIDENCE = {
    CURRENCY_SYMBOL: 0.95,
    CLEAR_NUMBER: 0.95,
    SMALL_NUMBER: 0.85,
    /** Amounts below this are likely quantities or ordinals. */
    SMALL_NUMBER_BELOW: 10,
    THOUSAND_MULTIPLIER: 1000,
} as const;

/**
 * Income/expense indicator weights and confidence curves.
 */
export const TYPE_SCORING = {
    STRONG_WEIGHT: 2,
    WEAK_WEIGHT: 0.5,
    INCOME_BASE: 0.6,
    INCOME_CAP: 0.95,
    EXPENSE_BASE: 0.7,
    EXPENSE_CAP: 0.9,
    STEP: 0.1,
    DEFAULT_CONFIDENCE: 0.6,
} as const;

/**
 * Category scoring.
 * Raw score bands are checked top-down; the first band whose
 * minimum is reached gives the category confidence.
 */
export const CATEGORY_SCORING = {
    PRIMARY_HIT: 1.0,
    SECONDARY_HIT: 0.5,
    USER_EXACT_CONFIDENCE: 0.95,
    USER_WORD_SCORE: 2.5,
    USER_WORD_MIN_LENGTH: 4,
    BANDS: [
        { min: 3.0, confidence: 0.95 },
        { min: 2.0, confidence: 0.85 },
        { min: 1.5, confidence: 0.75 },
        { min: 1.0, confidence: 0.65 },
    ],
    WEAK_CONFIDENCE: 0.45,
} as const;

/**
 * Overall confidence fusion.
 */
export const CONFIDENCE_FUSION = {
    NOTHING_FOUND: 0.1,
    PARTIAL_FLOOR: 0.3,
    PARTIAL_FACTOR: 0.6,
    MULTI_KEYWORD_MIN: 2,
    MULTI_KEYWORD_BOOST: 1.1,
    MULTI_KEYWORD_CAP: 0.98,
    SHORT_TEXT_MAX_WORDS: 4,
    SHORT_TEXT_BOOST: 1.05,
    SHORT_TEXT_CAP: 0.95,
    TYPE_AMBIGUOUS_BELOW: 0.7,
    TYPE_AMBIGUITY_DISCOUNT: 0.9,
    DECIMALS: 3,
} as const;

/**
 * Description cleanup.
 */
export const DESCRIPTION = {
    MAX_LENGTH: 100,
    ELLIPSIS: '...',
    PLACEHOLDER: 'Transaction',
    /** Category keywords this short are left in place. */
    MIN_STRIP_KEYWORD_LENGTH: 4,
    EDGE_PUNCTUATION: '!,.:;-',
} as const;

/**
 * Caller-side input screening limits.
 */
export const INPUT_SCREEN = {
    MIN_LENGTH: 2,
    MAX_LENGTH: 200,
    MAX_SYMBOL_RATIO: 0.3,
    URL_MARKERS: ['http://', 'https://', 'www.'],
} as const;

/**
 * Budget alert configuration.
 * Spending above WARNING_RATIO of the budget (and not over it) is a warning.
 */
export const BUDGET = {
    WARNING_RATIO: '0.8',
    PERCENT_DECIMALS: 1,
} as const;

/**
 * Transaction ID configuration.
 */
export const TXN_ID = {
    LENGTH: 16,
    COLLISION_SUFFIX_START: 2,
    MAX_COLLISIONS: 99,
} as const;

/**
 * Payment method recorded per transaction direction.
 */
export const PAYMENT_METHOD = {
    expense: 'cash',
    income: 'bank',
} as const;
