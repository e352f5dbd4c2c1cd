import { lstatSync, unlinkSync } from 'fs';
import { join } from 'path';
import { sanitizeFolderName } from '../utils/filename.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { readDirectory } from '../utils/walk.js';
import type { LogicalDocument } from '../types/index.js';

/**
 * Copy of the document without the excluded folders. A document left with
 * no folders is routed to Uncategorized by the path resolver.
 */
export function applyExclusions(excluded: ReadonlySet<string>, doc: LogicalDocument): LogicalDocument {
    if (excluded.size === 0) {
        return { ...doc, folders: [...doc.folders] };
    }
    return {
        ...doc,
        folders: doc.folders.filter(folder => !excluded.has(folder)),
    };
}

function isRealDirectory(path: string): boolean {
    try {
        return lstatSync(path).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Delete every file below the directories of excluded folders, without
 * looking at timestamps. Symlinks are left alone and never followed.
 * Returns the paths that were removed.
 */
export function purgeExcludedFolders(root: string, excluded: ReadonlySet<string>, logger: Logger): string[] {
    const deleted: string[] = [];

    for (const folderName of excluded) {
        const folderPath = join(root, sanitizeFolderName(folderName));
        if (!isRealDirectory(folderPath)) {
            continue;
        }

        logger.debug(`Deleting excluded folder: ${folderPath}`);
        purgeRecursive(folderPath, deleted, logger);
    }

    return deleted;
}

function purgeRecursive(dir: string, deleted: string[], logger: Logger): void {
    for (const entry of readDirectory(dir, logger)) {
        const absolutePath = join(dir, entry.name);

        if (entry.isDirectory()) {
            purgeRecursive(absolutePath, deleted, logger);
        } else if (entry.isFile()) {
            try {
                unlinkSync(absolutePath);
                deleted.push(absolutePath);
                logger.debug(`Deleted: ${absolutePath}`);
            } catch (error) {
                logger.warn(`Failed to delete ${absolutePath}: ${errorMessage(error)}`);
            }
        }
    }
}
