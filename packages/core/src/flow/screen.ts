/**
 * Input screening applied before a message reaches the parser.
 *
 * Rejects small talk, URLs, pasted code and symbol noise. A rejected
 * message is not a transaction; the host should stay quiet about it.
 */

import { INPUT_SCREEN } from '../types/index.js';
import type { Screening } from '../types/index.js';

export type ScreenReason = 'empty' | 'casual' | 'too_short' | 'too_long' | 'url' | 'code' | 'symbols';

export type ScreenResult =
    | { accepted: true; text: string }
    | { accepted: false; reason: ScreenReason };

/**
 * Decide whether a message is worth parsing.
 *
 * @param raw - Message as received
 * @param screening - Casual words, code fragments and symbol set
 * @returns accepted with the trimmed text, or the first rule that rejected it
 */
export function screenInput(raw: string, screening: Screening): ScreenResult {
    const text = raw.trim();
    const lower = text.toLowerCase();

    if (text.length === 0) {
        return { accepted: false, reason: 'empty' };
    }

    if (screening.casual_words.includes(lower)) {
        return { accepted: false, reason: 'casual' };
    }

    if (text.length < INPUT_SCREEN.MIN_LENGTH) {
        return { accepted: false, reason: 'too_short' };
    }

    if (screening.code_patterns.some((fragment) => lower.includes(fragment))) {
        return { accepted: false, reason: 'code' };
    }

    let symbols = 0;
    for (const char of text) {
        if (screening.symbol_characters.includes(char)) symbols++;
    }
    if (symbols > text.length * INPUT_SCREEN.MAX_SYMBOL_RATIO) {
        return { accepted: false, reason: 'symbols' };
    }

    if (INPUT_SCREEN.URL_MARKERS.some((marker) => lower.includes(marker))) {
        return { accepted: false, reason: 'url' };
    }

    if (text.length > INPUT_SCREEN.MAX_LENGTH) {
        return { accepted: false, reason: 'too_long' };
    }

    return { accepted: true, text };
}
