// Schemas
export {
    TransactionTypeSchema,
    CategoryCandidateSchema,
    ParseResultSchema,
    MultiParseResultSchema,
    AnyParseResultSchema,
    PendingTransactionSchema,
    FlowSessionSchema,
    PaymentMethodSchema,
    CommitInputSchema,
    CommittedTransactionSchema,
    LedgerFileSchema,
    BudgetStatusSchema,
    BudgetSchema,
    CategoryKeywordsSchema,
    IndicatorSetSchema,
    ScreeningSchema,
    LexiconSchema,
    SettingsSchema,
    CategoriesFileSchema,
    BudgetsFileSchema,
} from './schemas.js';

// Types
export type {
    TransactionType,
    CategoryCandidate,
    ParseResult,
    MultiParseResult,
    AnyParseResult,
    PendingTransaction,
    FlowSession,
    PaymentMethod,
    CommitInput,
    CommittedTransaction,
    BudgetStatus,
    Budget,
    CategoryKeywords,
    IndicatorSet,
    Screening,
    Lexicon,
    Settings,
} from './schemas.js';

// Constants
export {
    FLOW_THRESHOLDS,
    AMOUNT_CONFIDENCE,
    TYPE_SCORING,
    CATEGORY_SCORING,
    CONFIDENCE_FUSION,
    DESCRIPTION,
    INPUT_SCREEN,
    BUDGET,
    TXN_ID,
    PAYMENT_METHOD,
} from './constants.js';

// Lexicon
export { DEFAULT_LEXICON, DEFAULT_LEXICON_PATH, loadLexicon, parseLexicon } from './lexicon.js';

// Errors
export { PersistenceError } from './errors.js';
