import { readdirSync } from 'fs';
import type { Dirent } from 'fs';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Entries of a directory sorted by name, or none when it cannot be read.
 * Dirent types come from the entry itself, so symlinks are never followed.
 */
export function readDirectory(dir: string, logger?: Logger): Dirent[] {
    let entries: Dirent[] = [];
    try {
        entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
        logger?.warn(`Failed to read directory ${dir}: ${errorMessage(error)}`);
        return [];
    }
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
