import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TranscriptSegmentSchema } from '../types/index.js';
import type { SourceDocument, TranscriptSegment } from '../types/index.js';
import { SyncError, errorMessage } from '../utils/errors.js';
import type { DocumentSource } from './types.js';

const CacheDocumentSchema = z.object({
    title: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    notes_markdown: z.string().nullish(),
});

const FolderMetadataSchema = z.object({
    title: z.string().nullish(),
    parent_document_list_id: z.string().nullish(),
});

const CacheStateSchema = z.object({
    documents: z.record(z.unknown()).default({}),
    transcripts: z.record(z.unknown()).default({}),
    documentLists: z.record(z.unknown()).default({}),
    documentListsMetadata: z.record(z.unknown()).default({}),
    sharedDocuments: z.record(z.unknown()).default({}),
});

const OuterCacheSchema = z.object({
    cache: z.union([z.string(), z.record(z.unknown())]),
});

const InnerCacheSchema = z.object({
    state: CacheStateSchema.default({}),
});

type CacheState = z.infer<typeof CacheStateSchema>;
type CacheDocument = z.infer<typeof CacheDocumentSchema>;

/**
 * Local cache file adapter
 *
 * The cache is double-encoded: the outer JSON holds `cache`, a JSON string
 * whose `state` has documents, transcripts, folders (document lists) and
 * shared documents keyed by id. Entries of an unexpected shape are skipped.
 */
export class CacheFileSource implements DocumentSource {
    readonly type = 'cache';

    constructor(private filePath: string) { }

    getRoot(): string {
        return this.filePath;
    }

    async load(): Promise<SourceDocument[]> {
        const state = await this.readState();
        const folderNames = this.folderNamesByDocument(state);
        const transcripts = this.transcriptsByDocument(state);

        const shared = new Map<string, CacheDocument>();
        for (const [id, value] of Object.entries(state.sharedDocuments)) {
            const parsed = CacheDocumentSchema.safeParse(value);
            if (parsed.success) shared.set(id, parsed.data);
        }

        const documents: SourceDocument[] = [];
        const seen = new Set<string>();

        const add = (id: string, doc: CacheDocument, notes: string | null | undefined) => {
            seen.add(id);
            documents.push({
                id,
                title: doc.title ?? '',
                created_at: doc.created_at ?? '',
                updated_at: doc.updated_at ?? '',
                notes_markdown: notes ?? null,
                transcript: transcripts.get(id) ?? [],
                folders: folderNames.get(id) ?? [],
            });
        };

        for (const [id, value] of Object.entries(state.documents)) {
            const parsed = CacheDocumentSchema.safeParse(value);
            if (!parsed.success) continue;
            add(id, parsed.data, parsed.data.notes_markdown || shared.get(id)?.notes_markdown);
        }

        for (const [id, doc] of shared) {
            if (!seen.has(id)) add(id, doc, doc.notes_markdown);
        }

        return documents;
    }

    private async readState(): Promise<CacheState> {
        try {
            const outer = OuterCacheSchema.parse(JSON.parse(await readFile(this.filePath, 'utf-8')));
            const inner: unknown = typeof outer.cache === 'string' ? JSON.parse(outer.cache) : outer.cache;
            return InnerCacheSchema.parse(inner).state;
        } catch (error) {
            throw new SyncError('parse', `Failed to read cache file ${this.filePath}: ${errorMessage(error)}`, {
                path: this.filePath,
                cause: error,
            });
        }
    }

    /**
     * Invert folder -> documents into document -> folder titles
     */
    private folderNamesByDocument(state: CacheState): Map<string, string[]> {
        const titles = new Map<string, string>();
        for (const [folderId, value] of Object.entries(state.documentListsMetadata)) {
            const parsed = FolderMetadataSchema.safeParse(value);
            if (parsed.success && parsed.data.title) {
                titles.set(folderId, parsed.data.title);
            }
        }

        const byDocument = new Map<string, string[]>();
        for (const [folderId, value] of Object.entries(state.documentLists)) {
            const docIds = z.array(z.string()).safeParse(value);
            const title = titles.get(folderId);
            if (!docIds.success || !title) continue;

            for (const docId of docIds.data) {
                const names = byDocument.get(docId) ?? [];
                names.push(title);
                byDocument.set(docId, names);
            }
        }
        return byDocument;
    }

    private transcriptsByDocument(state: CacheState): Map<string, TranscriptSegment[]> {
        const byDocument = new Map<string, TranscriptSegment[]>();
        for (const [docId, value] of Object.entries(state.transcripts)) {
            if (!Array.isArray(value)) continue;

            const segments: TranscriptSegment[] = [];
            for (const item of value) {
                const parsed = TranscriptSegmentSchema.safeParse(item);
                if (parsed.success) {
                    segments.push({ ...parsed.data, document_id: parsed.data.document_id ?? docId });
                }
            }
            byDocument.set(docId, segments);
        }
        return byDocument;
    }
}
