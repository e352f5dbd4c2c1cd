import { statSync } from 'fs';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

/**
 * A document is newer than its file only when strictly after the mtime.
 * Missing files, unreadable mtimes and invalid dates count as newer.
 */
export function isNewerThanFile(path: string, updatedAt: Date, logger?: Logger): boolean {
    const updatedMs = updatedAt.getTime();
    if (Number.isNaN(updatedMs)) return true;

    try {
        return updatedMs > statSync(path).mtimeMs;
    } catch (error) {
        logger?.debug(`Could not read mtime of ${path}: ${errorMessage(error)}`);
        return true;
    }
}
