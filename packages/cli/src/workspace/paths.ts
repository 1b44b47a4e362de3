import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Workspace } from '../types.js';

// packages/cli/{src,dist}/workspace/ -> packages/cli/assets
export const DEFAULT_CATEGORIES_PATH = fileURLToPath(
    new URL('../../assets/default-categories.yaml', import.meta.url)
);

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        data: join(root, 'data'),
        outputs: join(root, 'outputs'),
        ledgerPath: join(root, 'data', 'ledger.json'),
        config: {
            settingsPath: join(root, 'config', 'settings.yaml'),
            categoriesPath: join(root, 'config', 'categories.yaml'),
            budgetsPath: join(root, 'config', 'budgets.yaml'),
            defaultCategoriesPath: DEFAULT_CATEGORIES_PATH,
        },
    };
}

export function getOutputsPath(workspace: Workspace, month: string): string {
    return join(workspace.outputs, month);
}
