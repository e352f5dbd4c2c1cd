import { formatCombined } from '../processors/content.js';
import type { LogicalDocument, SourceDocument } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface BuiltDocuments {
    documents: LogicalDocument[];
    /** Every id the source reported, including skipped documents */
    knownIds: Set<string>;
}

/**
 * Parse a service timestamp; unparsable values become `now` so the
 * document is written at least once.
 */
export function parseTimestamp(value: string, now: Date = new Date()): Date {
    const parsed = value ? new Date(value) : now;
    return Number.isNaN(parsed.getTime()) ? now : parsed;
}

/**
 * Turn source documents into documents ready for the sync engine
 */
export function buildLogicalDocuments(
    sourceDocs: SourceDocument[],
    logger?: Logger,
    now: Date = new Date()
): BuiltDocuments {
    const documents: LogicalDocument[] = [];
    const knownIds = new Set<string>();

    for (const doc of sourceDocs) {
        if (knownIds.has(doc.id)) {
            logger?.debug(`Skipping duplicate document ${doc.id}`);
            continue;
        }
        knownIds.add(doc.id);

        const hasNotes = Boolean(doc.notes_markdown && doc.notes_markdown.trim());
        const hasTranscript = doc.transcript.length > 0;
        if (!hasNotes && !hasTranscript) {
            logger?.debug(`Skipping document '${doc.title}' - no notes or transcript`);
            continue;
        }

        const createdAt = doc.created_at && !Number.isNaN(Date.parse(doc.created_at))
            ? doc.created_at
            : now.toISOString();

        documents.push({
            id: doc.id,
            title: doc.title,
            createdAt,
            updatedAt: parseTimestamp(doc.updated_at, now),
            body: formatCombined({
                id: doc.id,
                title: doc.title,
                createdAt: doc.created_at,
                updatedAt: doc.updated_at,
                notes: doc.notes_markdown,
                segments: doc.transcript,
                folders: doc.folders,
            }),
            folders: [...doc.folders],
        });
    }

    return { documents, knownIds };
}
