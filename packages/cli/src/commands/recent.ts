import { recentTransactions } from '@chat-ledger/core';
import { openWorkspace } from '../workspace/config.js';
import { readLedgerFile } from '../stores/ledger.js';
import { renderRecent } from '../render/messages.js';
import { error, log } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

/**
 * Print the latest transactions, newest first.
 */
export async function recent(limitArg: string | undefined, options: CommandOptions): Promise<void> {
    const limit = limitArg === undefined ? 10 : Number.parseInt(limitArg, 10);
    if (!Number.isInteger(limit) || limit <= 0) {
        error(`Invalid count: ${limitArg}. Usage: chatledger recent [n]`);
        process.exit(1);
    }

    try {
        const { workspace, settings, categories } = openWorkspace(options.workspace);
        const transactions = (await readLedgerFile(workspace.ledgerPath))
            .filter((txn) => txn.user_id === settings.user_id);

        renderRecent(recentTransactions(transactions, limit), categories, settings.currency).forEach(log);
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
