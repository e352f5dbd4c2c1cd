import { closeSync, linkSync, openSync, readFileSync, renameSync, rmSync, writeSync } from 'fs';
import { join } from 'path';
import { SyncError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const LOCK_FILENAME = '.notesync.lock';

export interface SyncLock {
    path: string;
    release(): void;
}

function hasCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM means the process exists but belongs to someone else
        return hasCode(error, 'EPERM');
    }
}

function readOwner(lockPath: string): number | null {
    try {
        const pid = Number.parseInt(readFileSync(lockPath, 'utf-8').trim(), 10);
        return Number.isNaN(pid) ? null : pid;
    } catch {
        return null;
    }
}

/**
 * Remove a lock last seen holding `stalePid`. The lock is first renamed to a
 * name only this process uses, so two processes can never both remove it.
 * When the parked lock turns out to be someone else's fresh lock it is put
 * back, unless a newer lock already took its place. Returns true when the
 * stale lock was removed.
 */
export function takeOverStaleLock(lockPath: string, stalePid: number | null): boolean {
    const parkedPath = `${lockPath}.stale.${process.pid}`;
    try {
        renameSync(lockPath, parkedPath);
    } catch (error) {
        if (hasCode(error, 'ENOENT')) return false;
        throw new SyncError('io-fatal', `Failed to replace stale lock ${lockPath}: ${errorMessage(error)}`, {
            path: lockPath,
            cause: error,
        });
    }

    if (readOwner(parkedPath) === stalePid) {
        rmSync(parkedPath, { force: true });
        return true;
    }

    try {
        linkSync(parkedPath, lockPath);
    } catch (error) {
        if (!hasCode(error, 'EEXIST')) {
            throw new SyncError('io-fatal', `Failed to restore lock ${lockPath}: ${errorMessage(error)}`, {
                path: lockPath,
                cause: error,
            });
        }
    } finally {
        rmSync(parkedPath, { force: true });
    }
    return false;
}

/**
 * Take the exclusive lock on an output root. Two passes must never scan and
 * write the same tree at once. A lock left by a dead process is replaced.
 */
export function acquireSyncLock(root: string, logger?: Logger): SyncLock {
    const lockPath = join(root, LOCK_FILENAME);

    for (let attempt = 0; attempt < 2; attempt++) {
        try {
            const fd = openSync(lockPath, 'wx');
            try {
                writeSync(fd, `${process.pid}\n`);
            } finally {
                closeSync(fd);
            }
            return {
                path: lockPath,
                release: () => rmSync(lockPath, { force: true }),
            };
        } catch (error) {
            if (!hasCode(error, 'EEXIST')) {
                throw new SyncError('io-fatal', `Failed to create lock ${lockPath}: ${errorMessage(error)}`, {
                    path: lockPath,
                    cause: error,
                });
            }
        }

        const owner = readOwner(lockPath);
        if (owner !== null && isProcessAlive(owner)) {
            break;
        }
        if (takeOverStaleLock(lockPath, owner)) {
            logger?.warn(`Removed stale sync lock ${lockPath}${owner !== null ? ` (pid ${owner})` : ''}`);
        }
    }

    throw new SyncError('io-fatal', `Another sync is already running for ${root}`, { path: lockPath });
}
