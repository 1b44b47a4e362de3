import { summarizeDay } from '@chat-ledger/core';
import { openWorkspace } from '../workspace/config.js';
import { readLedgerFile } from '../stores/ledger.js';
import { renderDaySummary } from '../render/messages.js';
import { error, log } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

/**
 * Print today's (UTC) expenses by category.
 */
export async function today(options: CommandOptions): Promise<void> {
    try {
        const { workspace, settings, categories } = openWorkspace(options.workspace);
        const transactions = (await readLedgerFile(workspace.ledgerPath))
            .filter((txn) => txn.user_id === settings.user_id);

        const date = new Date().toISOString().slice(0, 10);
        renderDaySummary(summarizeDay(transactions, categories, date), settings.currency).forEach(log);
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
