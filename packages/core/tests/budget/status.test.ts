import { describe, it, expect } from 'vitest';
import { computeBudgetStatus, isBudgetAlert, sumMonthlyExpenses } from '../../src/budget/status.js';
import type { CommittedTransaction } from '../../src/types/index.js';

describe('computeBudgetStatus', () => {
    it('warns above 80%', () => {
        expect(computeBudgetStatus('1000000', '850000')).toEqual({
            budget_amount: '1000000',
            spent: '850000',
            percentage: 85,
            is_exceeded: false,
            is_warning: true,
        });
    });

    it('does not warn at exactly 80%', () => {
        const status = computeBudgetStatus('1000000', '800000');
        expect(status.is_warning).toBe(false);
        expect(status.is_exceeded).toBe(false);
    });

    it('still warns at exactly 100%', () => {
        const status = computeBudgetStatus('1000000', '1000000');
        expect(status.percentage).toBe(100);
        expect(status.is_warning).toBe(true);
        expect(status.is_exceeded).toBe(false);
    });

    it('marks spending over the budget as exceeded only', () => {
        const status = computeBudgetStatus('1000000', '1200000');
        expect(status.percentage).toBe(120);
        expect(status.is_exceeded).toBe(true);
        expect(status.is_warning).toBe(false);
    });

    it('rounds the percentage to one decimal', () => {
        expect(computeBudgetStatus('300', '100').percentage).toBe(33.3);
        expect(computeBudgetStatus('1000', '0.5').percentage).toBe(0.1);
    });

    it('reports 0% for a zero budget', () => {
        const status = computeBudgetStatus('0', '5000');
        expect(status.percentage).toBe(0);
        expect(status.is_exceeded).toBe(true);
    });

    it('normalizes amounts to plain decimal strings', () => {
        const status = computeBudgetStatus(500000, '1000.50');
        expect(status.budget_amount).toBe('500000');
        expect(status.spent).toBe('1000.5');
    });
});

describe('isBudgetAlert', () => {
    it('is true for warnings and exceeded budgets only', () => {
        expect(isBudgetAlert(computeBudgetStatus('100', '90'))).toBe(true);
        expect(isBudgetAlert(computeBudgetStatus('100', '150'))).toBe(true);
        expect(isBudgetAlert(computeBudgetStatus('100', '10'))).toBe(false);
    });
});

describe('sumMonthlyExpenses', () => {
    function txn(overrides: Partial<CommittedTransaction>): CommittedTransaction {
        return {
            txn_id: '0000000000000001',
            user_id: 'user-1',
            amount: '1000',
            category_id: 1,
            transaction_type: 'expense',
            description: 'Transaction',
            payment_method: 'cash',
            created_at: '2026-03-05T09:00:00.000Z',
            ...overrides,
        };
    }

    it('sums one user, category and month', () => {
        const transactions = [
            txn({ amount: '1000.25' }),
            txn({ amount: '2000' }),
            txn({ amount: '400', created_at: '2026-02-28T23:59:00.000Z' }),
            txn({ amount: '800', category_id: 2 }),
            txn({ amount: '300', user_id: 'user-2' }),
            txn({ amount: '5000', transaction_type: 'income', payment_method: 'bank' }),
        ];

        expect(sumMonthlyExpenses(transactions, 'user-1', 1, '2026-03')).toBe('3000.25');
    });

    it('returns 0 when nothing matches', () => {
        expect(sumMonthlyExpenses([], 'user-1', 1, '2026-03')).toBe('0');
    });
});
