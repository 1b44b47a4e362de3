/**
 * Keyword lexicon loading.
 *
 * The default lexicon ships as assets/lexicon.yaml beside this package.
 * It is read and validated once, then frozen; matchers share it read-only.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import { LexiconSchema, type Lexicon } from './schemas.js';

// src/ and dist/ sit at the same depth, so the path holds for both
export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../assets/lexicon.yaml', import.meta.url));

/**
 * Parse lexicon YAML text into a validated, frozen Lexicon.
 */
export function parseLexicon(content: string): Lexicon {
    return deepFreeze(LexiconSchema.parse(parse(content)));
}

/**
 * Load a lexicon file from disk.
 *
 * @throws Error naming the path when the file is missing or invalid
 */
export function loadLexicon(path: string = DEFAULT_LEXICON_PATH): Lexicon {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (err) {
        throw new Error(`Lexicon file not readable: ${path}`, { cause: err });
    }

    try {
        return parseLexicon(content);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Invalid lexicon in ${path}: ${reason}`, { cause: err });
    }
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

export const DEFAULT_LEXICON: Lexicon = loadLexicon();
