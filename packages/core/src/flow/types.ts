/**
 * Types for the disambiguation flow and the collaborators it drives.
 */

import type {
    BudgetStatus,
    CategoryCandidate,
    CommitInput,
    CommittedTransaction,
    FlowSession,
    ParseResult,
    PendingTransaction,
    TransactionType,
} from '../types/index.js';
import type { TransactionParser } from '../parser/parse.js';
import type { ScreenReason, ScreenResult } from './screen.js';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Read access to a user's categories.
 */
export interface CategoryStore {
    list(userId: string, type?: TransactionType): Promise<CategoryCandidate[]>;
    /** Case-insensitive exact name lookup. */
    findByName(userId: string, name: string, type?: TransactionType): Promise<CategoryCandidate | null>;
}

/**
 * Transaction storage. commit() throws PersistenceError on backing-store failure.
 */
export interface Ledger {
    commit(input: CommitInput): Promise<CommittedTransaction>;
}

/**
 * Budget lookups. Null when the category has no budget.
 */
export interface BudgetStore {
    status(userId: string, categoryId: number): Promise<BudgetStatus | null>;
}

/**
 * Per-user dialog state. A missing (or expired) entry means IDLE.
 */
export interface SessionStore {
    get(userId: string): Promise<FlowSession | null>;
    set(userId: string, session: FlowSession): Promise<void>;
    clear(userId: string): Promise<void>;
}

export interface FlowCollaborators {
    categories: CategoryStore;
    ledger: Ledger;
    budgets: BudgetStore;
    sessions: SessionStore;
}

export interface FlowContext extends FlowCollaborators {
    parser: TransactionParser;
    screen: (text: string) => ScreenResult;
}

// ============================================================================
// Decisions
// ============================================================================

export type FlowState = 'idle' | 'awaiting_category';

/**
 * Ask the user to pick a category for the head of the queue.
 */
export interface CategoryPrompt {
    pending: PendingTransaction;
    /** Queued transactions after this one. */
    remaining_count: number;
    choices: CategoryCandidate[];
}

export interface CommitRecord {
    transaction: CommittedTransaction;
    category: CategoryCandidate;
    /** Expense budgets only. */
    budget: BudgetStatus | null;
}

export interface FailedCommit {
    pending: PendingTransaction;
    category: CategoryCandidate;
    message: string;
}

export interface BudgetAlert {
    category: CategoryCandidate;
    status: BudgetStatus;
}

export type RejectReason =
    | 'unintelligible'
    | 'missing_amount'
    | 'no_categories'
    | 'category_not_found'
    | 'session_expired';

export type FailureReason = 'persistence' | 'category_lookup';

export type FlowDecision =
    | { kind: 'ignored'; reason: ScreenReason }
    | { kind: 'rejected'; reason: RejectReason; result?: ParseResult }
    | {
        kind: 'auto_created';
        created: CommitRecord[];
        failed: FailedCommit[];
        /** Sum of created expenses; income is not included. */
        total_expense: string;
        budget_alerts: BudgetAlert[];
        prompt: CategoryPrompt | null;
    }
    | { kind: 'prompt_category'; prompt: CategoryPrompt }
    | { kind: 'committed'; record: CommitRecord; next: CategoryPrompt | null }
    | { kind: 'cancelled'; discarded: number }
    | { kind: 'failed'; reason: FailureReason; message: string };

/**
 * Decision plus warnings about collaborator failures, for the host to log.
 */
export interface FlowOutput {
    decision: FlowDecision;
    warnings: string[];
}
