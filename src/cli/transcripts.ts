import { writeDocuments } from '../core/file-writer.js';
import { formatTranscript } from '../processors/content.js';
import { expandPath } from '../utils/home.js';
import { createLogger } from '../utils/logger.js';
import { loadSourceDocuments, openSettings } from './context.js';
import type { ExportContext, ExportOptions, ExportReport } from './notes.js';

export const DEFAULT_TRANSCRIPTS_OUTPUT = './transcripts';

/**
 * Export every transcript as a text file into one flat folder. Documents
 * without transcript segments are left out and take no filename.
 */
export async function runTranscriptsExport(options: ExportOptions, context: ExportContext): Promise<ExportReport> {
    const { settings, logger } = context;
    const documents = (await loadSourceDocuments(options, settings, logger))
        .filter(doc => doc.transcript.length > 0);
    const root = expandPath(options.output ?? DEFAULT_TRANSCRIPTS_OUTPUT);

    logger.info(`Exporting ${documents.length} transcripts to ${root}`);
    const { written } = writeDocuments(documents, root, {
        render: formatTranscript,
        extension: '.txt',
        logger,
    });

    return { root, documentCount: documents.length, written };
}

/**
 * Transcripts command handler
 */
export async function transcriptsCommand(options: ExportOptions): Promise<void> {
    const logger = createLogger(options);
    const settings = openSettings(logger);

    const report = await runTranscriptsExport(options, { settings, logger });
    console.log(`✓ Export completed (${report.written.length} files written)`);
}
