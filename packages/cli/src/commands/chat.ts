import { createInterface } from 'node:readline';
import { createFlowContext, createMemorySessionStore } from '@chat-ledger/core';
import { openWorkspace } from '../workspace/config.js';
import { createJsonLedger } from '../stores/ledger.js';
import { createCategoryStore } from '../stores/categories.js';
import { createBudgetStore } from '../stores/budgets.js';
import { createChatSession, type ChatSession } from '../chat/session.js';
import { error, info, log, warn } from '../utils/console.js';
import type { CommandOptions, LoadedWorkspace } from '../types.js';

/**
 * Wires the file-backed collaborators of a workspace into a chat session.
 */
export function createWorkspaceChat(loaded: LoadedWorkspace): ChatSession {
    const { workspace, settings, categories, budgets, lexicon } = loaded;
    const ledger = createJsonLedger(workspace.ledgerPath);

    const ctx = createFlowContext({
        categories: createCategoryStore(categories),
        ledger,
        budgets: createBudgetStore(budgets, () => ledger.readAll()),
        sessions: createMemorySessionStore(settings.session_ttl_minutes * 60 * 1000),
    }, lexicon);

    return createChatSession({
        ctx,
        userId: settings.user_id,
        currency: settings.currency,
        categories,
        readTransactions: () => ledger.readAll(),
    });
}

/**
 * Interactive loop. Reads stdin line by line; piped input works too.
 */
export async function chat(options: CommandOptions): Promise<void> {
    let session: ChatSession;
    try {
        session = createWorkspaceChat(openWorkspace(options.workspace));
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
    rl.setPrompt('> ');

    if (process.stdin.isTTY) {
        info('Type a transaction like "50k taxi". /help lists commands.');
        rl.prompt();
    }

    for await (const line of rl) {
        let quit = false;
        try {
            const reply = await session.handleLine(line);
            reply.lines.forEach(log);
            reply.warnings.forEach(warn);
            quit = reply.quit;
        } catch (err) {
            error(err instanceof Error ? err.message : String(err));
        }
        if (quit) break;
        if (process.stdin.isTTY) rl.prompt();
    }

    rl.close();
}
