import { Decimal } from 'decimal.js';
import { BUDGET } from '../types/index.js';
import type { BudgetStatus, CommittedTransaction } from '../types/index.js';

/**
 * Compare spending against a budget.
 *
 * Spending above 80% of the budget is a warning; above 100% it is exceeded
 * (and no longer a warning). A zero budget reports 0%.
 *
 * @param budgetAmount - Budget for the period
 * @param spent - Amount spent in the same period
 */
export function computeBudgetStatus(budgetAmount: Decimal.Value, spent: Decimal.Value): BudgetStatus {
    const budget = new Decimal(budgetAmount);
    const used = new Decimal(spent);

    const percentage = budget.greaterThan(0)
        ? used.dividedBy(budget).times(100).toDecimalPlaces(BUDGET.PERCENT_DECIMALS, Decimal.ROUND_HALF_UP).toNumber()
        : 0;

    const isExceeded = used.greaterThan(budget);
    const isWarning = !isExceeded && used.greaterThan(budget.times(BUDGET.WARNING_RATIO));

    return {
        budget_amount: budget.toFixed(),
        spent: used.toFixed(),
        percentage,
        is_exceeded: isExceeded,
        is_warning: isWarning,
    };
}

/**
 * True when the status deserves an alert (warning or exceeded).
 */
export function isBudgetAlert(status: BudgetStatus): boolean {
    return status.is_exceeded || status.is_warning;
}

/**
 * Total expenses of one user and category within a calendar month.
 *
 * @param month - "YYYY-MM", matched against the UTC date of created_at
 * @returns Decimal string
 */
export function sumMonthlyExpenses(
    transactions: readonly CommittedTransaction[],
    userId: string,
    categoryId: number,
    month: string
): string {
    let total = new Decimal(0);
    for (const txn of transactions) {
        if (txn.transaction_type !== 'expense') continue;
        if (txn.user_id !== userId || txn.category_id !== categoryId) continue;
        if (txn.created_at.slice(0, 7) !== month) continue;
        total = total.plus(txn.amount);
    }
    return total.toFixed();
}
