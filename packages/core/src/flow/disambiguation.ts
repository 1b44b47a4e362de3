/**
 * Disambiguation flow: decides per message whether to record a transaction
 * straight away, ask the user for its category, or turn it down.
 *
 * States per user:
 *   IDLE              no stored session
 *   AWAITING_CATEGORY a queue of pending transactions; the head is on screen
 *
 * Confidence thresholds:
 *   < 0.4                                   rejected (single messages only)
 *   >= 0.75 with known category and amount  recorded
 *   anything else                           queued for a category choice
 *
 * A queued entry without an amount cannot be recorded; picking its
 * category drops it with rejected(missing_amount).
 *
 * Collaborator failures never escape: they become `failed` decisions or
 * warnings on the output.
 */

import { Decimal } from 'decimal.js';
import { DEFAULT_LEXICON, FLOW_THRESHOLDS, PAYMENT_METHOD } from '../types/index.js';
import type {
    AnyParseResult,
    BudgetStatus,
    CategoryCandidate,
    Lexicon,
    MultiParseResult,
    ParseResult,
    PendingTransaction,
} from '../types/index.js';
import { createTransactionParser } from '../parser/parse.js';
import { isBudgetAlert } from '../budget/status.js';
import { screenInput } from './screen.js';
import type {
    BudgetAlert,
    CategoryPrompt,
    CommitRecord,
    FailedCommit,
    FlowCollaborators,
    FlowContext,
    FlowDecision,
    FlowOutput,
    FlowState,
} from './types.js';

/**
 * Wire collaborators to a parser and input screen built from one lexicon.
 */
export function createFlowContext(
    collaborators: FlowCollaborators,
    lexicon: Lexicon = DEFAULT_LEXICON
): FlowContext {
    return {
        ...collaborators,
        parser: createTransactionParser(lexicon),
        screen: (text) => screenInput(text, lexicon.screening),
    };
}

export async function getFlowState(ctx: FlowContext, userId: string): Promise<FlowState> {
    const session = await ctx.sessions.get(userId);
    return session ? 'awaiting_category' : 'idle';
}

/**
 * Handle a free-text chat message.
 *
 * While a category prompt is open the message is not parsed; the open
 * prompt is shown again instead.
 */
export async function handleMessage(ctx: FlowContext, userId: string, text: string): Promise<FlowOutput> {
    const screened = ctx.screen(text);
    if (!screened.accepted) {
        return output({ kind: 'ignored', reason: screened.reason });
    }

    const warnings: string[] = [];

    const session = await ctx.sessions.get(userId);
    if (session) {
        return promptQueue(ctx, userId, session.queue, warnings);
    }

    let categories: CategoryCandidate[] = [];
    try {
        categories = await ctx.categories.list(userId);
    } catch (err) {
        warnings.push(`Category list unavailable, parsing without user categories: ${errorMessage(err)}`);
    }

    const result = ctx.parser.parse(screened.text, categories);
    const applied = await applyParseResult(ctx, userId, result);
    return { decision: applied.decision, warnings: [...warnings, ...applied.warnings] };
}

/**
 * Act on a parse result: record, queue for a category, or reject.
 */
export async function applyParseResult(
    ctx: FlowContext,
    userId: string,
    result: AnyParseResult
): Promise<FlowOutput> {
    if (result.is_multiple) {
        return applyMultiple(ctx, userId, result);
    }
    return applySingle(ctx, userId, result);
}

/**
 * The user picked a category for the transaction at the head of the queue.
 */
export async function selectCategory(ctx: FlowContext, userId: string, categoryId: number): Promise<FlowOutput> {
    const warnings: string[] = [];

    const session = await ctx.sessions.get(userId);
    if (!session || session.queue.length === 0) {
        return output({ kind: 'rejected', reason: 'session_expired' });
    }

    const [current, ...rest] = session.queue;

    if (!hasAmount(current)) {
        await ctx.sessions.clear(userId);
        return output({ kind: 'rejected', reason: 'missing_amount' });
    }

    let choices: CategoryCandidate[];
    try {
        choices = await ctx.categories.list(userId, current.transaction_type);
    } catch (err) {
        await ctx.sessions.clear(userId);
        warnings.push(`Category lookup failed: ${errorMessage(err)}`);
        return output({ kind: 'failed', reason: 'category_lookup', message: errorMessage(err) }, warnings);
    }

    const category = choices.find((choice) => choice.id === categoryId);
    if (!category) {
        // Stale or foreign id: drop the queue so the user is not stuck
        await ctx.sessions.clear(userId);
        return output({ kind: 'rejected', reason: 'category_not_found' });
    }

    let record: CommitRecord;
    try {
        record = await commitPending(ctx, userId, current, category, warnings);
    } catch (err) {
        await ctx.sessions.clear(userId);
        warnings.push(`Failed to save transaction: ${errorMessage(err)}`);
        return output({ kind: 'failed', reason: 'persistence', message: errorMessage(err) }, warnings);
    }

    if (rest.length === 0) {
        await ctx.sessions.clear(userId);
        return output({ kind: 'committed', record, next: null }, warnings);
    }

    const next = await queueOrWarn(ctx, userId, rest, warnings);
    return output({ kind: 'committed', record, next }, warnings);
}

/**
 * Drop the whole pending queue.
 */
export async function cancelPending(ctx: FlowContext, userId: string): Promise<FlowOutput> {
    const session = await ctx.sessions.get(userId);
    await ctx.sessions.clear(userId);
    return output({ kind: 'cancelled', discarded: session ? session.queue.length : 0 });
}

// ============================================================================
// Single & multiple results
// ============================================================================

async function applySingle(ctx: FlowContext, userId: string, result: ParseResult): Promise<FlowOutput> {
    const warnings: string[] = [];

    if (result.confidence < FLOW_THRESHOLDS.REJECT_BELOW) {
        return output({ kind: 'rejected', reason: 'unintelligible', result });
    }

    let category: CategoryCandidate | null;
    try {
        category = await resolveCategory(ctx, userId, result);
    } catch (err) {
        warnings.push(`Category lookup failed: ${errorMessage(err)}`);
        return output({ kind: 'failed', reason: 'category_lookup', message: errorMessage(err) }, warnings);
    }

    const pending = toPending(result);

    if (category && hasAmount(pending) && result.confidence >= FLOW_THRESHOLDS.AUTO_CREATE_AT) {
        let record: CommitRecord;
        try {
            record = await commitPending(ctx, userId, pending, category, warnings);
        } catch (err) {
            warnings.push(`Failed to save transaction: ${errorMessage(err)}`);
            return output({ kind: 'failed', reason: 'persistence', message: errorMessage(err) }, warnings);
        }

        return output({
            kind: 'auto_created',
            created: [record],
            failed: [],
            total_expense: expenseTotal([record]),
            budget_alerts: budgetAlerts([record]),
            prompt: null,
        }, warnings);
    }

    return promptQueue(ctx, userId, [pending], warnings);
}

async function applyMultiple(ctx: FlowContext, userId: string, result: MultiParseResult): Promise<FlowOutput> {
    const warnings: string[] = [];
    const autoCreate: { pending: PricedPending; category: CategoryCandidate }[] = [];
    const needCategory: PendingTransaction[] = [];

    for (const segment of result.segments) {
        const pending = toPending(segment);
        if (!hasAmount(pending)) continue;

        let category: CategoryCandidate | null = null;
        try {
            category = await resolveCategory(ctx, userId, segment);
        } catch (err) {
            warnings.push(`Category lookup failed for "${segment.raw_text}": ${errorMessage(err)}`);
        }

        if (category && segment.confidence >= FLOW_THRESHOLDS.AUTO_CREATE_AT) {
            autoCreate.push({ pending, category });
        } else {
            needCategory.push(pending);
        }
    }

    if (autoCreate.length === 0) {
        return promptQueue(ctx, userId, needCategory, warnings);
    }

    // One failing commit must not stop the rest of the batch
    const created: CommitRecord[] = [];
    const failed: FailedCommit[] = [];
    for (const { pending, category } of autoCreate) {
        try {
            created.push(await commitPending(ctx, userId, pending, category, warnings));
        } catch (err) {
            warnings.push(`Failed to save "${pending.description}": ${errorMessage(err)}`);
            failed.push({ pending, category, message: errorMessage(err) });
        }
    }

    const prompt = needCategory.length > 0
        ? await queueOrWarn(ctx, userId, needCategory, warnings)
        : null;

    return output({
        kind: 'auto_created',
        created,
        failed,
        total_expense: expenseTotal(created),
        budget_alerts: budgetAlerts(created),
        prompt,
    }, warnings);
}

// ============================================================================
// Queue handling
// ============================================================================

/**
 * Store the queue and build a prompt for its head.
 *
 * @returns null (and no stored session) when the user has no category of the head's type
 * @throws whatever the category store throws
 */
async function queuePending(
    ctx: FlowContext,
    userId: string,
    queue: PendingTransaction[]
): Promise<CategoryPrompt | null> {
    const [head] = queue;
    const choices = await ctx.categories.list(userId, head.transaction_type);

    if (choices.length === 0) {
        await ctx.sessions.clear(userId);
        return null;
    }

    await ctx.sessions.set(userId, { state: 'awaiting_category', queue });
    return { pending: head, remaining_count: queue.length - 1, choices };
}

/**
 * Queue and prompt, turning a failed or empty category list into a decision.
 */
async function promptQueue(
    ctx: FlowContext,
    userId: string,
    queue: PendingTransaction[],
    warnings: string[]
): Promise<FlowOutput> {
    let prompt: CategoryPrompt | null;
    try {
        prompt = await queuePending(ctx, userId, queue);
    } catch (err) {
        await ctx.sessions.clear(userId);
        warnings.push(`Category lookup failed: ${errorMessage(err)}`);
        return output({ kind: 'failed', reason: 'category_lookup', message: errorMessage(err) }, warnings);
    }

    if (!prompt) {
        return output({ kind: 'rejected', reason: 'no_categories' }, warnings);
    }
    return output({ kind: 'prompt_category', prompt }, warnings);
}

/**
 * Queue and prompt after something was already recorded.
 * Failures only warn, since the recorded part must still be reported.
 */
async function queueOrWarn(
    ctx: FlowContext,
    userId: string,
    queue: PendingTransaction[],
    warnings: string[]
): Promise<CategoryPrompt | null> {
    try {
        const prompt = await queuePending(ctx, userId, queue);
        if (!prompt) {
            warnings.push(`No ${queue[0].transaction_type} categories to choose from; ${queue.length} transaction(s) not saved`);
        }
        return prompt;
    } catch (err) {
        await ctx.sessions.clear(userId);
        warnings.push(`Category lookup failed; ${queue.length} transaction(s) not saved: ${errorMessage(err)}`);
        return null;
    }
}

// ============================================================================
// Helpers
// ============================================================================

async function resolveCategory(
    ctx: FlowContext,
    userId: string,
    result: ParseResult
): Promise<CategoryCandidate | null> {
    if (result.category === null) return null;
    return ctx.categories.findByName(userId, result.category, result.transaction_type);
}

/**
 * A pending transaction that can be recorded.
 */
type PricedPending = PendingTransaction & { amount: number };

function hasAmount(pending: PendingTransaction): pending is PricedPending {
    return pending.amount !== null;
}

function toPending(result: ParseResult): PendingTransaction {
    return {
        amount: result.amount,
        description: result.description,
        suggested_category: result.category,
        transaction_type: result.transaction_type,
        confidence: result.confidence,
    };
}

/**
 * Record a transaction, then read its budget (expenses only).
 *
 * @throws whatever the ledger throws; budget failures only warn
 */
async function commitPending(
    ctx: FlowContext,
    userId: string,
    pending: PricedPending,
    category: CategoryCandidate,
    warnings: string[]
): Promise<CommitRecord> {
    const transaction = await ctx.ledger.commit({
        user_id: userId,
        amount: new Decimal(pending.amount).toFixed(),
        category_id: category.id,
        transaction_type: pending.transaction_type,
        description: pending.description,
        payment_method: PAYMENT_METHOD[pending.transaction_type],
    });

    let budget: BudgetStatus | null = null;
    if (pending.transaction_type === 'expense') {
        try {
            budget = await ctx.budgets.status(userId, category.id);
        } catch (err) {
            warnings.push(`Budget status unavailable for ${category.name}: ${errorMessage(err)}`);
        }
    }

    return { transaction, category, budget };
}

function expenseTotal(records: readonly CommitRecord[]): string {
    return records
        .filter((record) => record.transaction.transaction_type === 'expense')
        .reduce((sum, record) => sum.plus(record.transaction.amount), new Decimal(0))
        .toFixed();
}

function budgetAlerts(records: readonly CommitRecord[]): BudgetAlert[] {
    const alerts: BudgetAlert[] = [];
    for (const record of records) {
        if (record.budget && isBudgetAlert(record.budget)) {
            alerts.push({ category: record.category, status: record.budget });
        }
    }
    return alerts;
}

function output(decision: FlowDecision, warnings: string[] = []): FlowOutput {
    return { decision, warnings };
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
