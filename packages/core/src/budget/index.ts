/**
 * Budget module: spending against monthly category budgets.
 */

export { computeBudgetStatus, isBudgetAlert, sumMonthlyExpenses } from './status.js';
