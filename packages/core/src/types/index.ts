/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@chat-ledger/shared';

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
    DEFAULT_LEXICON,
    PersistenceError,
} from '@chat-ledger/shared';
