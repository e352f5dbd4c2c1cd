import { join } from 'path';
import { sanitizeFolderName } from '../utils/filename.js';

export const UNCATEGORIZED_FOLDER = 'Uncategorized';

/**
 * Paths a document should occupy: one per folder, or a single path under
 * Uncategorized when it has none. Folders that sanitize to the same name
 * share one path.
 */
export function resolveTargetPaths(folders: string[], filename: string, root: string): string[] {
    if (folders.length === 0) {
        return [join(root, UNCATEGORIZED_FOLDER, filename)];
    }

    const paths: string[] = [];
    const seen = new Set<string>();
    for (const folder of folders) {
        const path = join(root, sanitizeFolderName(folder), filename);
        if (!seen.has(path)) {
            seen.add(path);
            paths.push(path);
        }
    }
    return paths;
}
