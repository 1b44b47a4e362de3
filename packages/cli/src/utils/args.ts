import type { CommandOptions } from '../types.js';

export interface ParsedArgs {
    positionals: string[];
    options: CommandOptions;
}

/**
 * Split argv into positional arguments and options.
 * Only --workspace (-w) is recognised; anything else is positional.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const options: CommandOptions = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--workspace' || arg === '-w') {
            const value = argv[i + 1];
            if (value === undefined) {
                throw new Error(`${arg} needs a directory`);
            }
            options.workspace = value;
            i++;
        } else if (arg.startsWith('--workspace=')) {
            options.workspace = arg.slice('--workspace='.length);
        } else {
            positionals.push(arg);
        }
    }

    return { positionals, options };
}
