import { z } from 'zod';

// Transcript segment as produced by the service
export const TranscriptSegmentSchema = z.object({
    id: z.string().default(''),
    document_id: z.string().optional(),
    start_timestamp: z.string().default(''),
    end_timestamp: z.string().default(''),
    text: z.string().default(''),
    source: z.string().default(''),
    is_final: z.boolean().default(false),
});

export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

// A document as handed over by a document source, before rendering
export const SourceDocumentSchema = z.object({
    id: z.string().min(1),
    title: z.string().nullish().transform(value => value ?? ''),
    created_at: z.string().default(''),
    updated_at: z.string().default(''),
    notes_markdown: z.string().nullish(),
    transcript: z.array(TranscriptSegmentSchema).default([]),
    folders: z.array(z.string()).default([]),
});

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;

// JSON export file: either { documents: [...] } or a bare array
export const ExportFileSchema = z.union([
    z.object({ documents: z.array(SourceDocumentSchema) }),
    z.array(SourceDocumentSchema).transform(documents => ({ documents })),
]);

/**
 * A document ready to be written: body already rendered, timestamps resolved
 */
export interface LogicalDocument {
    id: string;
    title: string;
    createdAt: string;      // ISO 8601 with offset
    updatedAt: Date;
    body: string;
    folders: string[];
}

export type SyncAction = 'added' | 'updated' | 'deleted';

export interface SyncStats {
    added: number;
    updated: number;
    moved: number;
    deleted: number;
    skipped: number;
}

export interface SyncResult {
    documentId: string;
    action: SyncAction;
    path: string;
}

export interface SyncOutcome {
    stats: SyncStats;
    results: SyncResult[];
}

export function emptyStats(): SyncStats {
    return { added: 0, updated: 0, moved: 0, deleted: 0, skipped: 0 };
}

// Sidecar stored in the output root; snake_case keys are the on-disk format
export const SyncConfigSchema = z.object({
    excluded_folders: z.array(z.string()).default([]),
    updated_at: z.string().default(''),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export const WebhookMethodSchema = z.enum(['GET', 'POST', 'PUT', 'PATCH']);

export type WebhookMethod = z.infer<typeof WebhookMethodSchema>;

export const WebhookConfigSchema = z.object({
    name: z.string().min(1),
    url: z.string().url(),
    method: z.preprocess(
        value => (typeof value === 'string' ? value.toUpperCase() : value),
        WebhookMethodSchema
    ).default('POST'),
    enabled: z.boolean().default(true),
    folders: z.array(z.string()).default([]),
});

export type WebhookConfig = z.infer<typeof WebhookConfigSchema>;

export const SourceTypeSchema = z.enum(['export', 'cache']);

export type SourceType = z.infer<typeof SourceTypeSchema>;

export const LastSyncSchema = z.object({
    time: z.string(),
    status: z.enum(['success', 'error']),
    message: z.string().default(''),
    stats: z.object({
        added: z.number().int().nonnegative(),
        updated: z.number().int().nonnegative(),
        moved: z.number().int().nonnegative(),
        deleted: z.number().int().nonnegative(),
        skipped: z.number().int().nonnegative(),
    }).optional(),
});

export type LastSync = z.infer<typeof LastSyncSchema>;

export const SettingsSchema = z.object({
    version: z.string().default('0.1'),
    outputFolder: z.string().optional(),
    sourcePath: z.string().optional(),
    sourceType: SourceTypeSchema.default('export'),
    excludedFolders: z.array(z.string()).default([]),
    excludedFoldersUpdated: z.string().optional(),
    lastSync: LastSyncSchema.optional(),
    webhooks: z.array(WebhookConfigSchema).default([]),
});

export type Settings = z.infer<typeof SettingsSchema>;
