import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { openWorkspace } from '../workspace/config.js';
import { getOutputsPath } from '../workspace/paths.js';
import { readLedgerFile } from '../stores/ledger.js';
import { generateTransactionsExcel } from '../excel/transactions.js';
import { arrow, error, success } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

/**
 * Write outputs/<month>/transactions.xlsx for one month.
 */
export async function exportMonth(month: string | undefined, options: CommandOptions): Promise<void> {
    if (!month || !MONTH_PATTERN.test(month)) {
        error('Usage: chatledger export <YYYY-MM>');
        process.exit(1);
    }
    const period: string = month;

    try {
        const { workspace, settings, categories } = openWorkspace(options.workspace);
        const transactions = (await readLedgerFile(workspace.ledgerPath))
            .filter((txn) => txn.user_id === settings.user_id && txn.created_at.startsWith(period));

        const outputPath = getOutputsPath(workspace, period);
        const filePath = join(outputPath, 'transactions.xlsx');

        const workbook = generateTransactionsExcel(transactions, categories, settings.currency);
        await mkdir(outputPath, { recursive: true });
        await workbook.xlsx.writeFile(filePath);

        success(`Exported ${transactions.length} transaction(s) for ${period}`);
        arrow(filePath);
    } catch (err) {
        error(`Failed to export ${month}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }
}
