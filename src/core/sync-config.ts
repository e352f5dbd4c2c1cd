/**
 * Sync folder configuration.
 *
 * The exclusion list is mirrored into a sidecar file in the output root so
 * that machines sharing the folder (through a cloud drive) converge on the
 * same exclusions. The newer timestamp wins; ties keep the local list.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { SyncConfigSchema } from '../types/index.js';
import type { SyncConfig } from '../types/index.js';
import { writeFileAtomic } from '../utils/atomic.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const SYNC_CONFIG_FILENAME = '.sync-config.json';

export interface LocalExclusions {
    excludedFolders: string[];
    updatedAt?: string;
}

export interface EffectiveExclusions {
    excludedFolders: string[];
    /** 'sidecar' when the shared config was newer and local settings should adopt it */
    origin: 'local' | 'sidecar';
    /** Timestamp of the winning list */
    updatedAt?: string;
}

export function getSyncConfigPath(root: string): string {
    return join(root, SYNC_CONFIG_FILENAME);
}

/**
 * Load the sidecar, or null when it is missing or unreadable
 */
export function loadSyncConfig(root: string, logger?: Logger): SyncConfig | null {
    const configPath = getSyncConfigPath(root);
    if (!existsSync(configPath)) {
        return null;
    }

    try {
        const parsed = SyncConfigSchema.safeParse(JSON.parse(readFileSync(configPath, 'utf-8')));
        if (!parsed.success) {
            logger?.warn(`Ignoring invalid sync config at ${configPath}: ${parsed.error.message}`);
            return null;
        }
        return parsed.data;
    } catch (error) {
        logger?.warn(`Ignoring unreadable sync config at ${configPath}: ${errorMessage(error)}`);
        return null;
    }
}

/**
 * Save the sidecar with a fresh timestamp and return what was written
 */
export function saveSyncConfig(root: string, excludedFolders: string[], now: Date = new Date()): SyncConfig {
    const config: SyncConfig = {
        excluded_folders: [...excludedFolders],
        updated_at: now.toISOString(),
    };
    writeFileAtomic(getSyncConfigPath(root), JSON.stringify(config, null, 2) + '\n');
    return config;
}

function parseTimestamp(value: string): number {
    return value ? Date.parse(value) : Number.NaN;
}

/**
 * Last-writer-wins merge of the local exclusion list with the sidecar
 */
export function mergeExclusions(local: LocalExclusions, sidecar: SyncConfig | null): EffectiveExclusions {
    const fromLocal: EffectiveExclusions = {
        excludedFolders: local.excludedFolders,
        origin: 'local',
        updatedAt: local.updatedAt,
    };

    if (sidecar === null) {
        return fromLocal;
    }

    const fromSidecar: EffectiveExclusions = {
        excludedFolders: sidecar.excluded_folders,
        origin: 'sidecar',
        updatedAt: sidecar.updated_at || undefined,
    };

    if (!local.updatedAt) {
        return fromSidecar;
    }

    const localTime = parseTimestamp(local.updatedAt);
    const sidecarTime = parseTimestamp(sidecar.updated_at);

    // An unparsable timestamp on either side defers to the shared copy
    if (Number.isNaN(localTime) || Number.isNaN(sidecarTime)) {
        return fromSidecar;
    }

    return sidecarTime > localTime ? fromSidecar : fromLocal;
}

export function getEffectiveExclusions(root: string, local: LocalExclusions, logger?: Logger): EffectiveExclusions {
    return mergeExclusions(local, loadSyncConfig(root, logger));
}
