import { readFileSync, existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import {
    BudgetsFileSchema,
    CategoriesFileSchema,
    DEFAULT_LEXICON,
    SettingsSchema,
    loadLexicon,
    type Budget,
    type CategoryCandidate,
    type Lexicon,
    type Settings,
} from '@chat-ledger/shared';
import { detectWorkspaceRoot } from './detect.js';
import { DEFAULT_CATEGORIES_PATH, resolveWorkspace } from './paths.js';
import type { LoadedWorkspace, Workspace } from '../types.js';

/**
 * Loads config/settings.yaml. An empty file yields the defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        throw new Error(`Settings file not found: ${path}`);
    }
    return parseYamlFile(path, SettingsSchema, {});
}

/**
 * Loads the user's categories, falling back to the bundled defaults
 * when the workspace has no config/categories.yaml.
 */
export function loadCategories(workspace: Workspace): CategoryCandidate[] {
    if (!existsSync(workspace.config.categoriesPath)) {
        return loadDefaultCategories(workspace.config.defaultCategoriesPath);
    }
    return parseYamlFile(workspace.config.categoriesPath, CategoriesFileSchema, []);
}

/**
 * Loads the categories bundled with the CLI.
 */
export function loadDefaultCategories(path: string = DEFAULT_CATEGORIES_PATH): CategoryCandidate[] {
    return parseYamlFile(path, CategoriesFileSchema, []);
}

/**
 * Loads monthly budgets. No file means no budgets.
 */
export function loadBudgets(workspace: Workspace): Budget[] {
    const path = workspace.config.budgetsPath;
    if (!existsSync(path)) {
        return [];
    }
    return parseYamlFile(path, BudgetsFileSchema, []);
}

/**
 * Loads the keyword lexicon named in settings, or the bundled one.
 */
export function loadWorkspaceLexicon(workspace: Workspace, settings: Settings): Lexicon {
    if (!settings.lexicon) {
        return DEFAULT_LEXICON;
    }
    const path = isAbsolute(settings.lexicon) ? settings.lexicon : join(workspace.root, settings.lexicon);
    return loadLexicon(path);
}

/**
 * Detects and loads a workspace.
 *
 * @param explicitRoot - --workspace value, skips detection
 * @throws Error when no workspace is found or a config file is invalid
 */
export function openWorkspace(explicitRoot?: string): LoadedWorkspace {
    const root = explicitRoot || detectWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Create config/settings.yaml or pass --workspace <dir>.');
    }

    const workspace = resolveWorkspace(root);
    const settings = loadSettings(workspace);

    return {
        workspace,
        settings,
        categories: loadCategories(workspace),
        budgets: loadBudgets(workspace),
        lexicon: loadWorkspaceLexicon(workspace, settings),
    };
}

function parseYamlFile<T extends z.ZodTypeAny>(path: string, schema: T, empty: unknown): z.output<T> {
    const content = readFileSync(path, 'utf-8');

    let data: unknown;
    try {
        data = parse(content);
    } catch (err) {
        throw new Error(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = schema.safeParse(data ?? empty);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid config in ${path}: ${issues}`);
    }
    return result.data;
}
