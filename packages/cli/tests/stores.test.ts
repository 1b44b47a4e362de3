import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PersistenceError, type CommitInput, type CommittedTransaction } from '@chat-ledger/core';
import { createJsonLedger, readLedgerFile } from '../src/stores/ledger.js';
import { createCategoryStore } from '../src/stores/categories.js';
import { createBudgetStore } from '../src/stores/budgets.js';

const TAXI: CommitInput = {
    user_id: 'local',
    amount: '50000',
    category_id: 2,
    transaction_type: 'expense',
    description: 'taxi',
    payment_method: 'cash',
};

const fixedClock = () => new Date('2026-03-14T09:30:00.000Z');

describe('json ledger', () => {
    let root: string;
    let ledgerPath: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'chatledger-ledger-'));
        ledgerPath = join(root, 'data', 'ledger.json');
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    it('reads a missing file as empty', async () => {
        expect(await readLedgerFile(ledgerPath)).toEqual([]);
    });

    it('stores a transaction with id and timestamp', async () => {
        const ledger = createJsonLedger(ledgerPath, fixedClock);
        const txn = await ledger.commit(TAXI);

        expect(txn.txn_id).toMatch(/^[0-9a-f]{16}$/);
        expect(txn).toMatchObject({ ...TAXI, created_at: '2026-03-14T09:30:00.000Z' });

        const onDisk: unknown = JSON.parse(readFileSync(ledgerPath, 'utf8'));
        expect(onDisk).toEqual([txn]);
        expect(await ledger.readAll()).toEqual([txn]);
    });

    it('suffixes a colliding id', async () => {
        const ledger = createJsonLedger(ledgerPath, fixedClock);
        const first = await ledger.commit(TAXI);
        const second = await ledger.commit(TAXI);

        expect(second.txn_id).toBe(`${first.txn_id}-02`);
    });

    it('keeps both of two concurrent commits', async () => {
        const ledger = createJsonLedger(ledgerPath, fixedClock);
        await Promise.all([
            ledger.commit(TAXI),
            ledger.commit({ ...TAXI, amount: '15000', description: 'snacks' }),
        ]);

        const stored = await ledger.readAll();
        expect(stored.map((txn) => txn.description)).toEqual(['taxi', 'snacks']);
    });

    it('rejects a corrupt file with PersistenceError', async () => {
        writeFileSync(join(root, 'ledger.json'), '{ not json');
        const ledger = createJsonLedger(join(root, 'ledger.json'), fixedClock);

        await expect(ledger.commit(TAXI)).rejects.toBeInstanceOf(PersistenceError);
        await expect(ledger.readAll()).rejects.toThrow('is corrupt');
    });

    it('rejects a file that is not a transaction list', async () => {
        writeFileSync(join(root, 'ledger.json'), '[{"txn_id": "nope"}]');
        await expect(readLedgerFile(join(root, 'ledger.json'))).rejects.toBeInstanceOf(PersistenceError);
    });
});

describe('category store', () => {
    const store = createCategoryStore([
        { id: 1, name: 'Food', type: 'expense' },
        { id: 2, name: 'Other', type: 'expense' },
        { id: 3, name: 'Other', type: 'income' },
    ]);

    it('lists by type', async () => {
        expect((await store.list('local', 'income')).map((c) => c.id)).toEqual([3]);
        expect(await store.list('local')).toHaveLength(3);
    });

    it('finds names case-insensitively within a type', async () => {
        expect(await store.findByName('local', '  food ', 'expense')).toEqual({ id: 1, name: 'Food', type: 'expense' });
        expect((await store.findByName('local', 'OTHER', 'income'))?.id).toBe(3);
        expect(await store.findByName('local', 'food', 'income')).toBeNull();
    });
});

describe('budget store', () => {
    function txn(amount: string, categoryId: number, createdAt: string): CommittedTransaction {
        return {
            ...TAXI,
            txn_id: '0123456789abcdef',
            amount,
            category_id: categoryId,
            created_at: createdAt,
        };
    }

    const transactions = [
        txn('30000', 2, '2026-03-01T08:00:00.000Z'),
        txn('20000', 2, '2026-03-14T08:00:00.000Z'),
        txn('90000', 2, '2026-02-28T23:59:00.000Z'),
        txn('10000', 1, '2026-03-14T08:00:00.000Z'),
    ];

    const store = createBudgetStore(
        [{ category_id: 2, amount: '60000' }],
        async () => transactions,
        fixedClock
    );

    it('sums the current month against the budget', async () => {
        expect(await store.status('local', 2)).toEqual({
            budget_amount: '60000',
            spent: '50000',
            percentage: 83.3,
            is_exceeded: false,
            is_warning: true,
        });
    });

    it('returns null without a budget', async () => {
        expect(await store.status('local', 1)).toBeNull();
    });

    it('only counts the asking user', async () => {
        expect((await store.status('someone-else', 2))?.spent).toBe('0');
    });
});
