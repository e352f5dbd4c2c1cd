import { existsSync, mkdirSync, statSync, accessSync, constants } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { errorMessage } from './errors.js';

/**
 * Error thrown when NOTESYNC_HOME is invalid or unwritable
 */
export class NotesyncHomeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotesyncHomeError';
    }
}

/**
 * Get the NOTESYNC_HOME directory path
 *
 * Resolution order:
 * 1. NOTESYNC_HOME environment variable
 * 2. Default to ~/.notesync
 */
export function getNotesyncHome(): string {
    const envHome = process.env.NOTESYNC_HOME;
    if (envHome) {
        return resolve(envHome);
    }
    return join(homedir(), '.notesync');
}

/**
 * Ensure the home directory exists and is writable
 *
 * @throws NotesyncHomeError if the path is invalid or unwritable
 */
export function ensureNotesyncHome(homePath: string = getNotesyncHome()): void {
    if (!existsSync(homePath)) {
        try {
            mkdirSync(homePath, { recursive: true });
        } catch (error) {
            throw new NotesyncHomeError(
                `Failed to create NOTESYNC_HOME at '${homePath}': ${errorMessage(error)}`
            );
        }
    }

    if (!statSync(homePath).isDirectory()) {
        throw new NotesyncHomeError(
            `NOTESYNC_HOME path '${homePath}' exists but is not a directory`
        );
    }

    try {
        accessSync(homePath, constants.W_OK | constants.X_OK);
    } catch {
        throw new NotesyncHomeError(
            `NOTESYNC_HOME at '${homePath}' is not writable or not executable. ` +
            `Check permissions and try again.`
        );
    }
}

/**
 * Get the settings file path within NOTESYNC_HOME
 */
export function getSettingsPath(): string {
    return join(getNotesyncHome(), 'settings.json');
}

/**
 * Expand ~ and $VAR / ${VAR} references and make the path absolute
 */
export function expandPath(input: string): string {
    let path = input.trim().replace(/\$\{(\w+)\}|\$(\w+)/g, (match: string, braced?: string, bare?: string) => {
        const name = braced ?? bare;
        return name !== undefined ? process.env[name] ?? match : match;
    });

    if (path === '~') {
        path = homedir();
    } else if (path.startsWith('~/')) {
        path = join(homedir(), path.slice(2));
    }

    return resolve(path);
}
