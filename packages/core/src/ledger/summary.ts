/**
 * Read-side summaries over committed transactions.
 */

import { Decimal } from 'decimal.js';
import type { CategoryCandidate, CommittedTransaction } from '../types/index.js';

export interface CategoryTotal {
    category_id: number;
    category_name: string;
    total: string;
    count: number;
    /** Share of the day's expense total, whole percent. */
    percentage: number;
}

export interface DaySummary {
    /** YYYY-MM-DD (UTC) */
    date: string;
    total: string;
    count: number;
    by_category: CategoryTotal[];
}

/**
 * Summarize one day's expenses.
 *
 * Income is left out. Categories are ordered by total, largest first;
 * ties keep ascending category id.
 *
 * @param date - "YYYY-MM-DD", matched against the UTC date of created_at
 */
export function summarizeDay(
    transactions: readonly CommittedTransaction[],
    categories: readonly CategoryCandidate[],
    date: string
): DaySummary {
    const names = new Map(categories.map((c) => [c.id, c.name]));
    const buckets = new Map<number, { total: Decimal; count: number }>();
    let total = new Decimal(0);
    let count = 0;

    for (const txn of transactions) {
        if (txn.transaction_type !== 'expense') continue;
        if (txn.created_at.slice(0, 10) !== date) continue;

        const bucket = buckets.get(txn.category_id) ?? { total: new Decimal(0), count: 0 };
        bucket.total = bucket.total.plus(txn.amount);
        bucket.count++;
        buckets.set(txn.category_id, bucket);

        total = total.plus(txn.amount);
        count++;
    }

    const byCategory: CategoryTotal[] = [...buckets.entries()]
        .sort(([idA, a], [idB, b]) => b.total.comparedTo(a.total) || idA - idB)
        .map(([categoryId, bucket]) => ({
            category_id: categoryId,
            category_name: names.get(categoryId) ?? `Category ${categoryId}`,
            total: bucket.total.toFixed(),
            count: bucket.count,
            percentage: total.isZero()
                ? 0
                : bucket.total.dividedBy(total).times(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber(),
        }));

    return { date, total: total.toFixed(), count, by_category: byCategory };
}

/**
 * Newest transactions first.
 */
export function recentTransactions(
    transactions: readonly CommittedTransaction[],
    limit = 10
): CommittedTransaction[] {
    if (limit <= 0) return [];
    return [...transactions]
        .sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0))
        .slice(0, limit);
}
