import type { Workbook } from 'exceljs';
import { Decimal } from 'decimal.js';
import type { CategoryCandidate, CommittedTransaction } from '@chat-ledger/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatAmountColumn } from './utils.js';

/**
 * Monthly export: every transaction, totals per category and a summary.
 */
export function generateTransactionsExcel(
    transactions: readonly CommittedTransaction[],
    categories: readonly CategoryCandidate[],
    currency: string
): Workbook {
    const workbook = createWorkbook();
    const names = new Map(categories.map((c) => [c.id, c.name]));
    const categoryName = (id: number) => names.get(id) ?? `Category ${id}`;

    addTransactionsSheet(workbook, transactions, categoryName, currency);
    addCategorySheet(workbook, transactions, categoryName, currency);
    addSummarySheet(workbook, transactions, currency);

    return workbook;
}

/**
 * Sheet: Transactions, oldest first.
 */
function addTransactionsSheet(
    workbook: Workbook,
    transactions: readonly CommittedTransaction[],
    categoryName: (id: number) => string,
    currency: string
): void {
    const sheet = workbook.addWorksheet('Transactions');
    sheet.columns = [
        { header: 'txn_id', key: 'txn_id' },
        { header: 'date', key: 'date' },
        { header: 'time', key: 'time' },
        { header: 'type', key: 'type' },
        { header: 'category', key: 'category' },
        { header: 'description', key: 'description' },
        { header: 'amount', key: 'amount' },
        { header: 'payment_method', key: 'payment_method' },
    ];

    const ordered = [...transactions].sort((a, b) => a.created_at.localeCompare(b.created_at));
    for (const txn of ordered) {
        sheet.addRow({
            txn_id: txn.txn_id,
            date: txn.created_at.slice(0, 10),
            time: txn.created_at.slice(11, 19),
            type: txn.transaction_type,
            category: categoryName(txn.category_id),
            description: txn.description,
            amount: new Decimal(txn.amount).toNumber(),
            payment_method: txn.payment_method,
        });
    }

    formatHeaderRow(sheet);
    formatAmountColumn(sheet, 'amount', currency);
    autoFitColumns(sheet);
}

/**
 * Sheet: By Category, largest total first.
 */
function addCategorySheet(
    workbook: Workbook,
    transactions: readonly CommittedTransaction[],
    categoryName: (id: number) => string,
    currency: string
): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category_id', key: 'category_id' },
        { header: 'category_name', key: 'category_name' },
        { header: 'type', key: 'type' },
        { header: 'total_amount', key: 'total_amount' },
        { header: 'transaction_count', key: 'transaction_count' },
    ];

    const stats = new Map<number, { type: string; total: Decimal; count: number }>();
    for (const txn of transactions) {
        const entry = stats.get(txn.category_id) ?? { type: txn.transaction_type, total: new Decimal(0), count: 0 };
        entry.total = entry.total.plus(txn.amount);
        entry.count++;
        stats.set(txn.category_id, entry);
    }

    const rows = [...stats.entries()].sort(([, a], [, b]) => b.total.comparedTo(a.total));
    for (const [id, entry] of rows) {
        sheet.addRow({
            category_id: id,
            category_name: categoryName(id),
            type: entry.type,
            total_amount: entry.total.toNumber(),
            transaction_count: entry.count,
        });
    }

    formatHeaderRow(sheet);
    formatAmountColumn(sheet, 'total_amount', currency);
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 */
function addSummarySheet(
    workbook: Workbook,
    transactions: readonly CommittedTransaction[],
    currency: string
): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'metric', key: 'metric' },
        { header: 'value', key: 'value' },
    ];

    let expenses = new Decimal(0);
    let income = new Decimal(0);
    for (const txn of transactions) {
        if (txn.transaction_type === 'expense') {
            expenses = expenses.plus(txn.amount);
        } else {
            income = income.plus(txn.amount);
        }
    }

    sheet.addRow({ metric: 'currency', value: currency });
    sheet.addRow({ metric: 'transaction_count', value: transactions.length });
    sheet.addRow({ metric: 'total_expense', value: expenses.toNumber() });
    sheet.addRow({ metric: 'total_income', value: income.toNumber() });
    sheet.addRow({ metric: 'net', value: income.minus(expenses).toNumber() });

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}
