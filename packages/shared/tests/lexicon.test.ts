import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_LEXICON, loadLexicon, parseLexicon } from '../src/lexicon.js';

describe('DEFAULT_LEXICON', () => {
    it('loads the bundled categories in order', () => {
        expect(DEFAULT_LEXICON.categories.map((c) => c.tag)).toEqual([
            'food',
            'transport',
            'groceries',
            'entertainment',
            'shopping',
            'bills',
            'healthcare',
        ]);
    });

    it('is frozen', () => {
        expect(Object.isFrozen(DEFAULT_LEXICON)).toBe(true);
        expect(Object.isFrozen(DEFAULT_LEXICON.categories[0].primary)).toBe(true);
    });

    it('leaves currency symbols out of the noise set', () => {
        expect(DEFAULT_LEXICON.screening.symbol_characters).not.toContain('$');
    });
});

describe('loadLexicon', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'lexicon-test-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('names a missing file', () => {
        const path = join(dir, 'missing.yaml');
        expect(() => loadLexicon(path)).toThrow(`Lexicon file not readable: ${path}`);
    });

    it('names an invalid file', () => {
        const path = join(dir, 'bad.yaml');
        writeFileSync(path, 'categories: []\n');
        expect(() => loadLexicon(path)).toThrow(`Invalid lexicon in ${path}`);
    });

    it('loads a valid file', () => {
        const path = join(dir, 'custom.yaml');
        writeFileSync(path, [
            'categories:',
            '  - tag: pets',
            '    weight: 1.5',
            '    primary: [vet]',
            'income_indicators:',
            '  strong: [refund]',
            'expense_indicators:',
            '  strong: [spent]',
            'connectors: [for]',
            'screening:',
            '  casual_words: [hi]',
            '  code_patterns: ["import "]',
            "  symbol_characters: '#'",
            '',
        ].join('\n'));

        const lexicon = loadLexicon(path);
        expect(lexicon.categories[0].weight).toBe(1.5);
        expect(lexicon.expense_indicators.weak).toEqual([]);
    });
});

describe('parseLexicon', () => {
    it('throws on invalid content', () => {
        expect(() => parseLexicon('connectors: 5')).toThrow();
    });
});
