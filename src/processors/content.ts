import type { SourceDocument, TranscriptSegment } from '../types/index.js';

const RULE = '='.repeat(80);

export interface CombinedContent {
    id: string;
    title: string;
    createdAt: string;
    updatedAt: string;
    notes?: string | null;
    segments: TranscriptSegment[];
    folders: string[];
}

/**
 * Render notes and transcript into the text stored in each synced file
 */
export function formatCombined(content: CombinedContent): string {
    const lines: string[] = [RULE];

    if (content.title) lines.push(content.title);
    lines.push(`ID: ${content.id}`);
    if (content.createdAt) lines.push(`Created: ${content.createdAt}`);
    if (content.updatedAt) lines.push(`Updated: ${content.updatedAt}`);
    if (content.folders.length > 0) lines.push(`Folders: ${content.folders.join(', ')}`);

    lines.push(RULE, '', '## Notes', '');
    lines.push(content.notes && content.notes.trim() ? content.notes : '(No notes)');

    lines.push('', RULE, '', '## Transcript', '');
    if (content.segments.length > 0) {
        for (const segment of content.segments) {
            lines.push(formatSegment(segment));
        }
    } else {
        lines.push('(No transcript available)');
    }

    return lines.join('\n');
}

/**
 * Render a transcript on its own; documents without segments render as ''
 */
export function formatTranscript(doc: SourceDocument): string {
    if (doc.transcript.length === 0) return '';

    const lines: string[] = [RULE];
    if (doc.title) lines.push(doc.title);
    lines.push(`ID: ${doc.id}`);
    if (doc.created_at) lines.push(`Created: ${doc.created_at}`);
    if (doc.updated_at) lines.push(`Updated: ${doc.updated_at}`);
    lines.push(`Segments: ${doc.transcript.length}`, RULE, '');

    for (const segment of doc.transcript) {
        lines.push(formatSegment(segment));
    }

    return lines.join('\n');
}

export function formatSegment(segment: TranscriptSegment): string {
    const speaker = segment.source === 'microphone' ? 'You' : 'System';
    return `[${clockTime(segment.start_timestamp)}] ${speaker}: ${segment.text}`;
}

/**
 * HH:MM:SS as written in an ISO 8601 timestamp; anything else is returned unchanged
 */
export function clockTime(timestamp: string): string {
    const match = /^\d{4}-\d{2}-\d{2}[T ](\d{2}):(\d{2})(?::(\d{2}))?/.exec(timestamp);
    if (!match) return timestamp;
    return `${match[1]}:${match[2]}:${match[3] ?? '00'}`;
}
