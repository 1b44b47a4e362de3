import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_LEXICON } from '@chat-ledger/shared';
import {
    loadBudgets,
    loadCategories,
    loadDefaultCategories,
    loadSettings,
    openWorkspace,
} from '../src/workspace/config.js';
import { resolveWorkspace } from '../src/workspace/paths.js';

describe('workspace config', () => {
    let root: string;

    function writeConfig(name: string, content: string): string {
        const path = join(root, 'config', name);
        writeFileSync(path, content);
        return path;
    }

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'chatledger-config-'));
        mkdirSync(join(root, 'config'));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    describe('loadSettings', () => {
        it('applies defaults to an empty file', () => {
            writeConfig('settings.yaml', '');
            expect(loadSettings(resolveWorkspace(root))).toEqual({
                user_id: 'local',
                currency: 'UZS',
                session_ttl_minutes: 10,
            });
        });

        it('reads explicit values', () => {
            writeConfig('settings.yaml', 'user_id: alice\ncurrency: USD\nsession_ttl_minutes: 5\n');
            expect(loadSettings(resolveWorkspace(root))).toEqual({
                user_id: 'alice',
                currency: 'USD',
                session_ttl_minutes: 5,
            });
        });

        it('names the file and field of an invalid value', () => {
            const path = writeConfig('settings.yaml', 'currency: usd\n');
            expect(() => loadSettings(resolveWorkspace(root))).toThrow(
                `Invalid config in ${path}: currency: Must be a 3-letter currency code`
            );
        });

        it('throws when the file is missing', () => {
            expect(() => loadSettings(resolveWorkspace(root))).toThrow('Settings file not found');
        });
    });

    describe('loadCategories', () => {
        it('falls back to the bundled categories', () => {
            const categories = loadCategories(resolveWorkspace(root));
            expect(categories).toEqual(loadDefaultCategories());
            expect(categories).toHaveLength(14);
            expect(categories[0]).toEqual({ id: 1, name: 'Food', type: 'expense' });
            expect(categories.filter((c) => c.type === 'income').map((c) => c.name)).toEqual([
                'Salary',
                'Freelance',
                'Investment',
                'Gift',
                'Other Income',
            ]);
        });

        it('reads a wrapped list', () => {
            writeConfig('categories.yaml', 'categories:\n  - { id: 5, name: Coffee, type: expense }\n');
            expect(loadCategories(resolveWorkspace(root))).toEqual([{ id: 5, name: 'Coffee', type: 'expense' }]);
        });

        it('reads a bare list', () => {
            writeConfig('categories.yaml', '- { id: 5, name: Coffee, type: expense }\n');
            expect(loadCategories(resolveWorkspace(root))).toEqual([{ id: 5, name: 'Coffee', type: 'expense' }]);
        });

        it('rejects duplicate ids', () => {
            const path = writeConfig('categories.yaml', [
                '- { id: 5, name: Coffee, type: expense }',
                '- { id: 5, name: Tea, type: expense }',
                '',
            ].join('\n'));
            expect(() => loadCategories(resolveWorkspace(root))).toThrow(`Invalid config in ${path}`);
        });
    });

    describe('loadBudgets', () => {
        it('returns no budgets without a file', () => {
            expect(loadBudgets(resolveWorkspace(root))).toEqual([]);
        });

        it('stores amounts as decimal strings', () => {
            writeConfig('budgets.yaml', 'budgets:\n  - { category_id: 1, amount: 500000 }\n');
            expect(loadBudgets(resolveWorkspace(root))).toEqual([{ category_id: 1, amount: '500000' }]);
        });
    });

    describe('openWorkspace', () => {
        it('loads everything from an explicit root', () => {
            writeConfig('settings.yaml', 'user_id: alice\n');
            const loaded = openWorkspace(root);

            expect(loaded.workspace.root).toBe(root);
            expect(loaded.settings.user_id).toBe('alice');
            expect(loaded.categories).toHaveLength(14);
            expect(loaded.budgets).toEqual([]);
            expect(loaded.lexicon).toBe(DEFAULT_LEXICON);
        });

        it('loads a lexicon relative to the root', () => {
            writeConfig('settings.yaml', 'lexicon: config/lexicon.yaml\n');
            writeConfig('lexicon.yaml', [
                'categories:',
                '  - { tag: pets, weight: 2, primary: [vet] }',
                'income_indicators: { strong: [refund] }',
                'expense_indicators: { strong: [spent] }',
                'connectors: [for]',
                'screening:',
                '  casual_words: [hi]',
                '  code_patterns: ["import "]',
                "  symbol_characters: '#'",
                '',
            ].join('\n'));

            const loaded = openWorkspace(root);
            expect(loaded.lexicon.categories.map((c) => c.tag)).toEqual(['pets']);
        });
    });
});
