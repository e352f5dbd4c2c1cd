import { writeDocuments } from '../core/file-writer.js';
import { formatNotesMarkdown } from '../processors/markdown.js';
import type { SettingsStore } from '../utils/config.js';
import { expandPath } from '../utils/home.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { loadSourceDocuments, openSettings } from './context.js';
import type { SourceOptions } from './context.js';

export const DEFAULT_NOTES_OUTPUT = './notes';

export interface ExportOptions extends SourceOptions {
    output?: string;
    verbose?: boolean;
    quiet?: boolean;
}

export interface ExportContext {
    settings: SettingsStore;
    logger: Logger;
}

export interface ExportReport {
    root: string;
    documentCount: number;
    written: string[];
}

/**
 * Export every document's notes as a markdown file into one flat folder
 */
export async function runNotesExport(options: ExportOptions, context: ExportContext): Promise<ExportReport> {
    const { settings, logger } = context;
    const documents = await loadSourceDocuments(options, settings, logger);
    const root = expandPath(options.output ?? DEFAULT_NOTES_OUTPUT);

    logger.info(`Exporting ${documents.length} notes to ${root}`);
    const { written } = writeDocuments(documents, root, {
        render: formatNotesMarkdown,
        extension: '.md',
        logger,
    });

    return { root, documentCount: documents.length, written };
}

/**
 * Notes command handler
 */
export async function notesCommand(options: ExportOptions): Promise<void> {
    const logger = createLogger(options);
    const settings = openSettings(logger);

    const report = await runNotesExport(options, { settings, logger });
    console.log(`✓ Export completed (${report.written.length} files written)`);
}
