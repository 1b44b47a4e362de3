import {
    computeBudgetStatus,
    sumMonthlyExpenses,
    type Budget,
    type BudgetStore,
    type CommittedTransaction,
} from '@chat-ledger/core';

/**
 * Budget store: configured monthly budgets against this month's ledger.
 *
 * @param readTransactions - Current ledger contents
 * @param now - Clock deciding the current (UTC) month
 */
export function createBudgetStore(
    budgets: readonly Budget[],
    readTransactions: () => Promise<CommittedTransaction[]>,
    now: () => Date = () => new Date()
): BudgetStore {
    return {
        async status(userId, categoryId) {
            const budget = budgets.find((b) => b.category_id === categoryId);
            if (!budget) {
                return null;
            }

            const month = now().toISOString().slice(0, 7);
            const spent = sumMonthlyExpenses(await readTransactions(), userId, categoryId, month);
            return computeBudgetStatus(budget.amount, spent);
        },
    };
}
