#!/usr/bin/env node
/**
 * Chat Ledger CLI
 *
 * The CLI owns all I/O (files, stdin, console); core receives text and
 * collaborators and returns decisions and warnings as data.
 */

import { chat } from './commands/chat.js';
import { parse } from './commands/parse.js';
import { today } from './commands/today.js';
import { recent } from './commands/recent.js';
import { exportMonth } from './commands/export.js';
import { parseArgs } from './utils/args.js';
import { error, log } from './utils/console.js';

const VERSION = '1.0.0';

function printUsage(): void {
    log(`Chat Ledger CLI v${VERSION}`);
    log('');
    log('Usage: chatledger <command> [args] [--workspace <dir>]');
    log('');
    log('Commands:');
    log('  chat               record transactions interactively');
    log('  parse <text...>    show how a message is parsed');
    log('  today              today\'s expenses by category');
    log('  recent [n]         last n transactions (default 10)');
    log('  export <YYYY-MM>   write outputs/<YYYY-MM>/transactions.xlsx');
    log('');
    log('Example:');
    log('  chatledger parse "45k taxi, 15k snacks"');
}

async function main(): Promise<void> {
    const { positionals, options } = parseArgs(process.argv.slice(2));
    const command: string | undefined = positionals[0];
    const rest = positionals.slice(1);

    switch (command) {
        case undefined:
        case 'help':
        case '--help':
        case '-h':
            printUsage();
            return;
        case 'chat':
            return chat(options);
        case 'parse':
            return parse(rest.join(' '), options);
        case 'today':
            return today(options);
        case 'recent':
            return recent(rest[0], options);
        case 'export':
            return exportMonth(rest[0], options);
        default:
            error(`Unknown command: ${command}`);
            printUsage();
            process.exit(1);
    }
}

main().catch((err: unknown) => {
    error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
