import { readFile } from 'fs/promises';
import { ExportFileSchema } from '../types/index.js';
import type { SourceDocument } from '../types/index.js';
import { SyncError, errorMessage } from '../utils/errors.js';
import type { DocumentSource } from './types.js';

/**
 * JSON export file adapter
 *
 * Reads `{ "documents": [...] }` or a bare array of documents as written by
 * the service's fetch step.
 */
export class ExportFileSource implements DocumentSource {
    readonly type = 'export';

    constructor(private filePath: string) { }

    getRoot(): string {
        return this.filePath;
    }

    async load(): Promise<SourceDocument[]> {
        let raw: unknown;
        try {
            raw = JSON.parse(await readFile(this.filePath, 'utf-8'));
        } catch (error) {
            throw new SyncError('parse', `Failed to read documents from ${this.filePath}: ${errorMessage(error)}`, {
                path: this.filePath,
                cause: error,
            });
        }

        const parsed = ExportFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw new SyncError('parse', `Invalid documents file ${this.filePath}${where}: ${issue?.message ?? 'unknown error'}`, {
                path: this.filePath,
            });
        }

        return parsed.data.documents;
    }
}
