import { createDocumentSource, parseSourceType } from '../core/source-manager.js';
import type { SourceDocument, SourceType } from '../types/index.js';
import { SettingsStore } from '../utils/config.js';
import { ensureNotesyncHome, getSettingsPath } from '../utils/home.js';
import type { Logger } from '../utils/logger.js';

/**
 * Open the settings store under NOTESYNC_HOME, creating the directory if needed
 */
export function openSettings(logger?: Logger): SettingsStore {
    ensureNotesyncHome();
    const settings = new SettingsStore(getSettingsPath(), logger);
    if (logger) {
        settings.subscribe(key => logger.debug(`Setting changed: ${key}`));
    }
    return settings;
}

export interface SourceOptions {
    source?: string;
    type?: string;
}

export interface SourceSelection {
    type: SourceType;
    path: string;
}

/**
 * Source file and type from command line options, falling back to settings
 */
export function selectSource(options: SourceOptions, settings: SettingsStore): SourceSelection {
    const path = options.source ?? settings.get('sourcePath');
    if (!path) {
        throw new Error('Source file not set. Use --source or `notesync config set sourcePath <file>`');
    }
    const type = options.type ? parseSourceType(options.type) : settings.get('sourceType');
    return { type, path };
}

/**
 * Load every document from the selected source
 */
export async function loadSourceDocuments(
    options: SourceOptions,
    settings: SettingsStore,
    logger: Logger
): Promise<SourceDocument[]> {
    const selection = selectSource(options, settings);
    const source = createDocumentSource(selection.type, selection.path);
    logger.info(`Reading documents from ${source.getRoot()} (${source.type})`);
    const documents = await source.load();
    logger.debug(`Loaded ${documents.length} documents`);
    return documents;
}
