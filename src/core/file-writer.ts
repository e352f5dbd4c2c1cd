import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import type { SourceDocument } from '../types/index.js';
import { SyncError, errorMessage } from '../utils/errors.js';
import { makeUnique, sanitizeFilename } from '../utils/filename.js';
import type { Logger } from '../utils/logger.js';
import { isNewerThanFile } from '../utils/staleness.js';

export interface FlatExportOptions {
    render: (doc: SourceDocument) => string;
    extension: string;
    logger?: Logger;
}

export interface FlatExportResult {
    written: string[];
    skipped: number;
}

/**
 * Write one file per document into a single directory, named after the
 * title. A file is rewritten only when the document changed after the
 * file's mtime; documents that render to nothing are skipped. Unlike a
 * sync pass, nothing is ever deleted and a failed write aborts the export.
 */
export function writeDocuments(
    docs: SourceDocument[],
    outputDir: string,
    options: FlatExportOptions
): FlatExportResult {
    const { render, extension, logger } = options;
    const dir = resolve(outputDir);

    try {
        mkdirSync(dir, { recursive: true });
    } catch (error) {
        throw new SyncError('io-fatal', `Failed to create output folder '${dir}': ${errorMessage(error)}`, {
            path: dir,
            cause: error,
        });
    }

    const used = new Map<string, number>();
    const written: string[] = [];
    let skipped = 0;

    for (const doc of docs) {
        const filename = makeUnique(sanitizeFilename(doc.title || doc.id, doc.id), used);
        const path = join(dir, `${filename}${extension}`);

        if (existsSync(path) && !isNewerThanFile(path, new Date(doc.updated_at), logger)) {
            skipped++;
            continue;
        }

        const content = render(doc);
        if (!content) {
            logger?.debug(`Nothing to write for ${doc.id}`);
            skipped++;
            continue;
        }

        try {
            writeFileSync(path, content, 'utf-8');
        } catch (error) {
            throw new SyncError('io-fatal', `Failed to write ${path}: ${errorMessage(error)}`, {
                path,
                cause: error,
            });
        }
        logger?.debug(`Wrote: ${path}`);
        written.push(path);
    }

    return { written, skipped };
}
