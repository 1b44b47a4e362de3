import { createTransactionParser, DEFAULT_LEXICON } from '@chat-ledger/core';
import { openWorkspace, loadDefaultCategories } from '../workspace/config.js';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { error, info, log } from '../utils/console.js';
import type { CommandOptions, LoadedWorkspace } from '../types.js';

/**
 * Diagnostic: print the parse result for a message as JSON.
 * Uses the workspace categories and lexicon when a workspace is found,
 * otherwise the bundled defaults.
 */
export async function parse(text: string, options: CommandOptions): Promise<void> {
    if (!text.trim()) {
        error('Nothing to parse. Usage: chatledger parse <text...>');
        process.exit(1);
    }

    let loaded: LoadedWorkspace | null = null;
    try {
        if (options.workspace || detectWorkspaceRoot()) {
            loaded = openWorkspace(options.workspace);
        }
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }

    const parser = createTransactionParser(loaded ? loaded.lexicon : DEFAULT_LEXICON);
    const categories = loaded ? loaded.categories : loadDefaultCategories();

    if (!loaded) {
        info('No workspace found; using the bundled categories and lexicon.');
    }

    log(JSON.stringify(parser.parse(text, categories), null, 2));
}
