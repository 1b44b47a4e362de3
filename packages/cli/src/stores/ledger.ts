import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    generateTxnId,
    resolveTxnIdCollision,
    PersistenceError,
    type CommitInput,
    type CommittedTransaction,
    type Ledger,
} from '@chat-ledger/core';
import { LedgerFileSchema } from '@chat-ledger/shared';

export interface JsonLedger extends Ledger {
    readAll(): Promise<CommittedTransaction[]>;
}

/**
 * Reads data/ledger.json. A missing file is an empty ledger.
 *
 * @throws PersistenceError when the file is unreadable or malformed
 */
export async function readLedgerFile(path: string): Promise<CommittedTransaction[]> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return [];
        }
        throw new PersistenceError(`Cannot read ledger ${path}: ${errorMessage(err)}`, { cause: err });
    }

    try {
        return LedgerFileSchema.parse(JSON.parse(content));
    } catch (err) {
        throw new PersistenceError(`Ledger ${path} is corrupt: ${errorMessage(err)}`, { cause: err });
    }
}

/**
 * Ledger backed by a JSON array on disk.
 *
 * Commits are serialized so two in-flight commits never read the same
 * snapshot and drop each other's write.
 *
 * @param path - Ledger file; parent directories are created on first write
 * @param now - Clock, injectable for tests
 */
export function createJsonLedger(path: string, now: () => Date = () => new Date()): JsonLedger {
    let queue: Promise<unknown> = Promise.resolve();

    async function append(input: CommitInput): Promise<CommittedTransaction> {
        const existing = await readLedgerFile(path);

        const createdAt = now().toISOString();
        const baseId = generateTxnId(createdAt, input.description, input.amount, input.user_id);
        const txnId = resolveTxnIdCollision(baseId, new Set(existing.map((t) => t.txn_id)));

        const transaction: CommittedTransaction = { txn_id: txnId, ...input, created_at: createdAt };

        try {
            await mkdir(dirname(path), { recursive: true });
            await writeFile(path, JSON.stringify([...existing, transaction], null, 2) + '\n');
        } catch (err) {
            throw new PersistenceError(`Cannot write ledger ${path}: ${errorMessage(err)}`, { cause: err });
        }

        return transaction;
    }

    return {
        commit(input) {
            const result = queue.then(() => append(input));
            // Keep the chain alive after a failed commit
            queue = result.catch(() => undefined);
            return result;
        },

        readAll() {
            return readLedgerFile(path);
        },
    };
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
