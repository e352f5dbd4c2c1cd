import { stringify as stringifyYaml } from 'yaml';
import type { SourceDocument } from '../types/index.js';

/**
 * Render a document's notes as markdown with a YAML front matter block.
 * Documents without notes still get the front matter and heading.
 */
export function formatNotesMarkdown(doc: SourceDocument): string {
    const metadata: Record<string, string | string[]> = {
        id: doc.id,
        created: doc.created_at,
        updated: doc.updated_at,
    };
    if (doc.folders.length > 0) {
        metadata.folders = doc.folders;
    }

    const parts = ['---', stringifyYaml(metadata).trim(), '---', ''];
    if (doc.title) {
        parts.push(`# ${doc.title}`, '');
    }

    const notes = doc.notes_markdown?.trim() ?? '';
    if (notes) {
        parts.push(notes, '');
    }

    return parts.join('\n');
}
