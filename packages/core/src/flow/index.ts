/**
 * Flow module: input screening and the category disambiguation dialog.
 */

export {
    createFlowContext,
    getFlowState,
    handleMessage,
    applyParseResult,
    selectCategory,
    cancelPending,
} from './disambiguation.js';
export { screenInput } from './screen.js';
export type { ScreenReason, ScreenResult } from './screen.js';
export type { MemorySessionStore } from './session-store.js';
export { createMemorySessionStore } from './session-store.js';
export type {
    CategoryStore,
    Ledger,
    BudgetStore,
    SessionStore,
    FlowCollaborators,
    FlowContext,
    FlowState,
    CategoryPrompt,
    CommitRecord,
    FailedCommit,
    BudgetAlert,
    RejectReason,
    FailureReason,
    FlowDecision,
    FlowOutput,
} from './types.js';
