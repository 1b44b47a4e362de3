/**
 * Ledger module: summaries over recorded transactions.
 */

export { summarizeDay, recentTransactions } from './summary.js';
export type { CategoryTotal, DaySummary } from './summary.js';
