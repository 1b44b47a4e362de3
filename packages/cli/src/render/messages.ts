/**
 * Text rendering of flow decisions and reports for the chat.
 */

import {
    isBudgetAlert,
    type BudgetAlert,
    type CategoryCandidate,
    type CategoryPrompt,
    type CommitRecord,
    type CommittedTransaction,
    type DaySummary,
    type FlowDecision,
    type RejectReason,
} from '@chat-ledger/core';
import { formatAmount } from './format.js';

const REJECTIONS: Record<RejectReason, string> = {
    unintelligible: 'I could not understand that. Try something like "50k taxi" or "received 5k salary".',
    missing_amount: 'That transaction had no amount, so it was not saved. Send it again with a number, e.g. "lunch 25k".',
    no_categories: 'There are no categories for this kind of transaction. Add some to config/categories.yaml.',
    category_not_found: 'That category is not available. The pending transactions were discarded.',
    session_expired: 'Nothing is waiting for a category. Send a new transaction.',
};

/**
 * Render a flow decision as chat text. Ignored messages render as no lines.
 */
export function renderDecision(decision: FlowDecision, currency: string): string[] {
    switch (decision.kind) {
        case 'ignored':
            return [];

        case 'rejected':
            return [REJECTIONS[decision.reason]];

        case 'auto_created': {
            const lines = decision.created.map((record) => renderRecord(record, currency));
            for (const failure of decision.failed) {
                lines.push(`✖ Not saved: ${failure.pending.description} (${failure.message})`);
            }
            if (decision.created.length > 1) {
                lines.push(`Total expenses: ${formatAmount(decision.total_expense, currency)}`);
            }
            lines.push(...decision.budget_alerts.map((alert) => renderBudgetAlert(alert, currency)));
            if (decision.prompt) {
                lines.push('', ...renderPrompt(decision.prompt, currency));
            }
            return lines;
        }

        case 'prompt_category':
            return renderPrompt(decision.prompt, currency);

        case 'committed': {
            const lines = [renderRecord(decision.record, currency)];
            const { budget, category } = decision.record;
            if (budget && isBudgetAlert(budget)) {
                lines.push(renderBudgetAlert({ category, status: budget }, currency));
            }
            if (decision.next) {
                lines.push('', ...renderPrompt(decision.next, currency));
            }
            return lines;
        }

        case 'cancelled':
            return decision.discarded > 0
                ? [`Cancelled ${decision.discarded} pending transaction(s).`]
                : ['Nothing to cancel.'];

        case 'failed':
            return decision.reason === 'persistence'
                ? [`✖ Could not save the transaction: ${decision.message}`]
                : [`✖ Could not load your categories: ${decision.message}`];
    }
}

/**
 * Numbered category choices for the head of the queue.
 */
export function renderPrompt(prompt: CategoryPrompt, currency: string): string[] {
    const { pending } = prompt;
    const subject = pending.amount === null
        ? `${pending.description} (no amount)`
        : `${formatAmount(pending.amount, currency)} · ${pending.description}`;
    const lines = [`Which category for ${subject}?`];
    if (pending.suggested_category) {
        lines.push(`(looks like ${pending.suggested_category})`);
    }
    prompt.choices.forEach((choice, index) => {
        lines.push(`  ${index + 1}. ${choice.name}`);
    });
    if (prompt.remaining_count > 0) {
        lines.push(`${prompt.remaining_count} more waiting after this one.`);
    }
    lines.push('Reply with a number, or "cancel".');
    return lines;
}

function renderRecord(record: CommitRecord, currency: string): string {
    const { transaction, category } = record;
    return `✓ Recorded ${transaction.transaction_type}: ${formatAmount(transaction.amount, currency)} · ${category.name} · ${transaction.description}`;
}

function renderBudgetAlert(alert: BudgetAlert, currency: string): string {
    const { status } = alert;
    const usage = `${formatAmount(status.spent, currency)} of ${formatAmount(status.budget_amount, currency)}`;
    return status.is_exceeded
        ? `⚠️  ${alert.category.name} budget exceeded: ${status.percentage}% used (${usage})`
        : `⚠️  ${alert.category.name} budget at ${status.percentage}% (${usage})`;
}

export function renderDaySummary(summary: DaySummary, currency: string): string[] {
    if (summary.count === 0) {
        return [`No expenses recorded on ${summary.date}.`];
    }
    return [
        `Expenses on ${summary.date}: ${formatAmount(summary.total, currency)} in ${summary.count} transaction(s)`,
        ...summary.by_category.map((entry) =>
            `  ${entry.category_name}: ${formatAmount(entry.total, currency)} (${entry.percentage}%, ${entry.count})`
        ),
    ];
}

export function renderRecent(
    transactions: readonly CommittedTransaction[],
    categories: readonly CategoryCandidate[],
    currency: string
): string[] {
    if (transactions.length === 0) {
        return ['No transactions yet.'];
    }
    const names = new Map(categories.map((c) => [c.id, c.name]));
    return transactions.map((txn) => {
        const when = `${txn.created_at.slice(0, 10)} ${txn.created_at.slice(11, 16)}`;
        const sign = txn.transaction_type === 'expense' ? '-' : '+';
        const category = names.get(txn.category_id) ?? `Category ${txn.category_id}`;
        return `${when}  ${sign}${formatAmount(txn.amount, currency)}  ${category} · ${txn.description}`;
    });
}

export function renderHelp(): string[] {
    return [
        'Type a transaction, e.g. "50k taxi", "lunch 25000" or "received 5k salary".',
        'Several at once: "45k taxi, 15k snacks".',
        'Commands:',
        '  /today         today\'s expenses by category',
        '  /recent [n]    last n transactions (default 10)',
        '  cancel         drop transactions waiting for a category',
        '  /help          this text',
        '  /quit          leave',
    ];
}
