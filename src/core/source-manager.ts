import { existsSync } from 'fs';
import type { DocumentSource } from '../adapters/types.js';
import { ExportFileSource } from '../adapters/export-file.js';
import { CacheFileSource } from '../adapters/cache.js';
import { SourceTypeSchema } from '../types/index.js';
import type { SourceType } from '../types/index.js';
import { SyncError } from '../utils/errors.js';
import { expandPath } from '../utils/home.js';

/**
 * Validate a source type given on the command line
 */
export function parseSourceType(value: string): SourceType {
    const parsed = SourceTypeSchema.safeParse(value);
    if (!parsed.success) {
        throw new Error(`Unsupported source type: ${value} (expected ${SourceTypeSchema.options.join('|')})`);
    }
    return parsed.data;
}

/**
 * Create an adapter instance based on type
 */
export function createDocumentSource(type: SourceType, path: string): DocumentSource {
    const filePath = expandPath(path);
    if (!existsSync(filePath)) {
        throw new SyncError('parse', `Source file not found: ${filePath}`, { path: filePath });
    }

    switch (type) {
        case 'export':
            return new ExportFileSource(filePath);
        case 'cache':
            return new CacheFileSource(filePath);
    }
}
