import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ExportFileSource } from '../src/adapters/export-file.js';
import { CacheFileSource } from '../src/adapters/cache.js';
import { createDocumentSource, parseSourceType } from '../src/core/source-manager.js';
import { SyncError } from '../src/utils/errors.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'adapters');

function writeJson(name: string, value: unknown): string {
    const path = join(TEST_DIR, name);
    writeFileSync(path, JSON.stringify(value));
    return path;
}

describe('Document Sources', () => {
    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    describe('ExportFileSource', () => {
        it('should read a documents object', async () => {
            const path = writeJson('export.json', {
                documents: [{ id: 'doc-1', title: null, notes_markdown: 'hi', folders: ['Work'] }],
            });

            const docs = await new ExportFileSource(path).load();

            expect(docs).toEqual([{
                id: 'doc-1',
                title: '',
                created_at: '',
                updated_at: '',
                notes_markdown: 'hi',
                transcript: [],
                folders: ['Work'],
            }]);
        });

        it('should read a bare array', async () => {
            const path = writeJson('export.json', [{ id: 'doc-1' }, { id: 'doc-2', title: 'Two' }]);

            const docs = await new ExportFileSource(path).load();

            expect(docs.map(doc => doc.id)).toEqual(['doc-1', 'doc-2']);
        });

        it('should reject documents without an id', async () => {
            const path = writeJson('export.json', { documents: [{ title: 'No id' }] });

            await expect(new ExportFileSource(path).load()).rejects.toMatchObject({ kind: 'parse' });
        });

        it('should reject malformed JSON', async () => {
            const path = join(TEST_DIR, 'broken.json');
            writeFileSync(path, '{ "documents": [');

            await expect(new ExportFileSource(path).load()).rejects.toBeInstanceOf(SyncError);
        });
    });

    describe('CacheFileSource', () => {
        const state = {
            documents: {
                'doc-aaaaaaaa': {
                    title: 'Standup',
                    created_at: '2024-02-01T09:00:00Z',
                    updated_at: '2024-02-01T09:30:00Z',
                    notes_markdown: '',
                },
                bad: 'not a document',
            },
            sharedDocuments: {
                'doc-aaaaaaaa': { notes_markdown: 'from shared' },
                'shared-bbbbbbbb': { title: 'Shared', notes_markdown: '# Notes' },
            },
            transcripts: {
                'doc-aaaaaaaa': [
                    { id: 's1', start_timestamp: '2024-02-01T09:00:01Z', text: 'Morning', source: 'microphone' },
                    'garbage',
                ],
            },
            documentLists: {
                f1: ['doc-aaaaaaaa', 'shared-bbbbbbbb'],
                f2: ['doc-aaaaaaaa'],
                f3: ['doc-aaaaaaaa'],
            },
            documentListsMetadata: {
                f1: { title: 'Work' },
                f2: { title: 'Clients' },
                f3: { title: '' },
            },
        };

        it('should read the double-encoded cache', async () => {
            const path = writeJson('cache.json', { cache: JSON.stringify({ state }) });

            const docs = await new CacheFileSource(path).load();

            expect(docs.map(doc => doc.id)).toEqual(['doc-aaaaaaaa', 'shared-bbbbbbbb']);
            expect(docs[0]).toEqual({
                id: 'doc-aaaaaaaa',
                title: 'Standup',
                created_at: '2024-02-01T09:00:00Z',
                updated_at: '2024-02-01T09:30:00Z',
                notes_markdown: 'from shared',
                transcript: [{
                    id: 's1',
                    document_id: 'doc-aaaaaaaa',
                    start_timestamp: '2024-02-01T09:00:01Z',
                    end_timestamp: '',
                    text: 'Morning',
                    source: 'microphone',
                    is_final: false,
                }],
                folders: ['Work', 'Clients'],
            });
            expect(docs[1]).toMatchObject({ title: 'Shared', notes_markdown: '# Notes', folders: ['Work'], transcript: [] });
        });

        it('should accept an already decoded cache object', async () => {
            const path = writeJson('cache.json', { cache: { state } });

            const docs = await new CacheFileSource(path).load();

            expect(docs).toHaveLength(2);
        });

        it('should reject files without a cache', async () => {
            const path = writeJson('cache.json', { state });

            await expect(new CacheFileSource(path).load()).rejects.toMatchObject({ kind: 'parse' });
        });
    });

    describe('createDocumentSource', () => {
        it('should pick the adapter for the source type', () => {
            const path = writeJson('export.json', []);

            expect(createDocumentSource('export', path)).toBeInstanceOf(ExportFileSource);
            expect(createDocumentSource('cache', path)).toBeInstanceOf(CacheFileSource);
        });

        it('should fail for a missing file', () => {
            expect(() => createDocumentSource('export', join(TEST_DIR, 'missing.json'))).toThrowError(
                `Source file not found: ${join(TEST_DIR, 'missing.json')}`
            );
        });

        it('should validate source types', () => {
            expect(parseSourceType('cache')).toBe('cache');
            expect(() => parseSourceType('sqlite')).toThrowError('Unsupported source type: sqlite (expected export|cache)');
        });
    });
});
