/**
 * Chat Ledger CLI - Core Types
 */

import type { CategoryCandidate, Budget, Lexicon, Settings } from '@chat-ledger/shared';

export interface CommandOptions {
    workspace?: string;
}

export interface WorkspaceConfig {
    settingsPath: string;
    categoriesPath: string;
    budgetsPath: string;
    defaultCategoriesPath: string;
}

export interface Workspace {
    root: string;
    data: string;
    outputs: string;
    ledgerPath: string;
    config: WorkspaceConfig;
}

/**
 * Everything a command needs from an opened workspace.
 */
export interface LoadedWorkspace {
    workspace: Workspace;
    settings: Settings;
    categories: CategoryCandidate[];
    budgets: Budget[];
    lexicon: Lexicon;
}
