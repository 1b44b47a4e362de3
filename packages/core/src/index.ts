// Types (re-exported from shared)
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
    Lexicon,
} from './types/index.js';

export {
    FLOW_THRESHOLDS,
    BUDGET,
    TXN_ID,
    PAYMENT_METHOD,
    DEFAULT_LEXICON,
    PersistenceError,
} from './types/index.js';

// Utils
export { generateTxnId, resolveTxnIdCollision, normalizeMessage } from './utils/index.js';

// Parser
export {
    createTransactionParser,
    parseTransaction,
    extractAmount,
    countAmountTokens,
    classifyType,
    matchCategory,
    extractDescription,
    scoreConfidence,
    applyTypeDiscount,
} from './parser/index.js';
export type { TransactionParser, AmountExtraction, TypeClassification, CategoryMatch, ConfidenceInput } from './parser/index.js';

// Flow
export {
    createFlowContext,
    getFlowState,
    handleMessage,
    applyParseResult,
    selectCategory,
    cancelPending,
    screenInput,
    createMemorySessionStore,
} from './flow/index.js';
export type {
    ScreenReason,
    ScreenResult,
    CategoryStore,
    Ledger,
    BudgetStore,
    SessionStore,
    MemorySessionStore,
    FlowCollaborators,
    FlowContext,
    FlowState,
    CategoryPrompt,
    CommitRecord,
    FailedCommit,
    BudgetAlert,
    RejectReason,
    FailureReason,
    FlowDecision,
    FlowOutput,
} from './flow/index.js';

// Budget
export { computeBudgetStatus, isBudgetAlert, sumMonthlyExpenses } from './budget/index.js';

// Ledger summaries
export { summarizeDay, recentTransactions } from './ledger/index.js';
export type { CategoryTotal, DaySummary } from './ledger/index.js';
