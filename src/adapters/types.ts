import type { SourceDocument, SourceType } from '../types/index.js';

/**
 * Document source interface - produces the documents to be synced
 */
export interface DocumentSource {
    readonly type: SourceType;

    /**
     * Load every document the source currently has
     */
    load(): Promise<SourceDocument[]>;

    /**
     * Get the file the source reads from
     */
    getRoot(): string;
}
