/**
 * One chat conversation: routes each input line to a command or the flow.
 *
 * Kept apart from readline so it can be driven line by line.
 */

import {
    cancelPending,
    handleMessage,
    recentTransactions,
    selectCategory,
    summarizeDay,
    type CategoryCandidate,
    type CategoryPrompt,
    type CommittedTransaction,
    type FlowContext,
    type FlowDecision,
    type FlowOutput,
} from '@chat-ledger/core';
import { renderDaySummary, renderDecision, renderHelp, renderRecent } from '../render/messages.js';

export interface ChatDeps {
    ctx: FlowContext;
    userId: string;
    currency: string;
    categories: readonly CategoryCandidate[];
    readTransactions: () => Promise<CommittedTransaction[]>;
    now?: () => Date;
}

export interface ChatReply {
    lines: string[];
    warnings: string[];
    quit: boolean;
}

export interface ChatSession {
    handleLine(line: string): Promise<ChatReply>;
}

const DEFAULT_RECENT_LIMIT = 10;

function reply(lines: string[], warnings: string[] = []): ChatReply {
    return { lines, warnings, quit: false };
}

/**
 * The prompt a decision leaves on screen, if any.
 */
function openPrompt(decision: FlowDecision): CategoryPrompt | null {
    switch (decision.kind) {
        case 'auto_created':
            return decision.prompt;
        case 'prompt_category':
            return decision.prompt;
        case 'committed':
            return decision.next;
        default:
            return null;
    }
}

export function createChatSession(deps: ChatDeps): ChatSession {
    const { ctx, userId, currency } = deps;
    const now = deps.now ?? (() => new Date());
    // Choices as last shown, so "2" means the second listed category
    let shownPrompt: CategoryPrompt | null = null;

    async function userTransactions(): Promise<CommittedTransaction[]> {
        return (await deps.readTransactions()).filter((txn) => txn.user_id === userId);
    }

    function fromFlow(output: FlowOutput): ChatReply {
        if (output.decision.kind !== 'ignored') {
            shownPrompt = openPrompt(output.decision);
        }
        return reply(renderDecision(output.decision, currency), output.warnings);
    }

    async function handleLine(line: string): Promise<ChatReply> {
        const text = line.trim();
        const lower = text.toLowerCase();

        // Whole-line commands, so "cancel fee 50k" is still a transaction
        switch (lower) {
            case '/quit':
            case '/exit':
                return { lines: ['Bye.'], warnings: [], quit: true };

            case '/help':
                return reply(renderHelp());

            case '/today': {
                const date = now().toISOString().slice(0, 10);
                const summary = summarizeDay(await userTransactions(), deps.categories, date);
                return reply(renderDaySummary(summary, currency));
            }

            case 'cancel':
            case '/cancel':
                return fromFlow(await cancelPending(ctx, userId));
        }

        const [command, ...args] = lower.split(/\s+/);
        if (command === '/recent') {
            const limit = args.length === 0 ? DEFAULT_RECENT_LIMIT : Number(args[0]);
            if (args.length > 1 || !Number.isInteger(limit) || limit <= 0) {
                return reply(['Usage: /recent [n] with n a positive number.']);
            }
            const recent = recentTransactions(await userTransactions(), limit);
            return reply(renderRecent(recent, deps.categories, currency));
        }

        if (shownPrompt && /^\d+$/.test(text)) {
            const choice = shownPrompt.choices[Number(text) - 1];
            if (!choice) {
                return reply([`Pick a number between 1 and ${shownPrompt.choices.length}.`]);
            }
            return fromFlow(await selectCategory(ctx, userId, choice.id));
        }

        return fromFlow(await handleMessage(ctx, userId, text));
    }

    return { handleLine };
}
