import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync, readFileSync } from 'fs';
import { join } from 'path';
import {
    mergeExclusions,
    loadSyncConfig,
    saveSyncConfig,
    getEffectiveExclusions,
    getSyncConfigPath,
} from '../src/core/sync-config.js';
import { Logger, LogLevel } from '../src/utils/logger.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'sync-config');

describe('Sync Config', () => {
    describe('mergeExclusions', () => {
        const sidecar = { excluded_folders: ['Shared'], updated_at: '2024-05-01T00:00:00.000Z' };

        it('should keep the local list when there is no sidecar', () => {
            expect(mergeExclusions({ excludedFolders: ['Local'], updatedAt: '2024-01-01T00:00:00Z' }, null)).toEqual({
                excludedFolders: ['Local'],
                origin: 'local',
                updatedAt: '2024-01-01T00:00:00Z',
            });
        });

        it('should adopt the sidecar when the local list was never stamped', () => {
            expect(mergeExclusions({ excludedFolders: ['Local'] }, sidecar)).toEqual({
                excludedFolders: ['Shared'],
                origin: 'sidecar',
                updatedAt: '2024-05-01T00:00:00.000Z',
            });
        });

        it('should adopt the newer sidecar', () => {
            const merged = mergeExclusions({ excludedFolders: ['Local'], updatedAt: '2024-04-30T23:59:59Z' }, sidecar);
            expect(merged.origin).toBe('sidecar');
            expect(merged.excludedFolders).toEqual(['Shared']);
        });

        it('should keep the local list when it is newer or on a tie', () => {
            expect(mergeExclusions({ excludedFolders: ['Local'], updatedAt: '2024-05-02T00:00:00Z' }, sidecar).origin)
                .toBe('local');
            expect(mergeExclusions({ excludedFolders: ['Local'], updatedAt: '2024-05-01T00:00:00Z' }, sidecar).origin)
                .toBe('local');
        });

        it('should defer to the sidecar when a timestamp cannot be parsed', () => {
            expect(mergeExclusions({ excludedFolders: ['Local'], updatedAt: 'yesterday' }, sidecar).origin)
                .toBe('sidecar');
            expect(mergeExclusions(
                { excludedFolders: ['Local'], updatedAt: '2024-05-02T00:00:00Z' },
                { excluded_folders: [], updated_at: '' }
            )).toEqual({ excludedFolders: [], origin: 'sidecar', updatedAt: undefined });
        });
    });

    describe('sidecar file', () => {
        const logger = new Logger(LogLevel.SILENT);

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

        it('should return null when the sidecar is missing', () => {
            expect(loadSyncConfig(TEST_DIR, logger)).toBeNull();
        });

        it('should save and load the exclusion list', () => {
            const written = saveSyncConfig(TEST_DIR, ['Personal', 'HR'], new Date('2024-05-01T12:00:00Z'));

            expect(written).toEqual({ excluded_folders: ['Personal', 'HR'], updated_at: '2024-05-01T12:00:00.000Z' });
            expect(loadSyncConfig(TEST_DIR, logger)).toEqual(written);
            expect(readFileSync(getSyncConfigPath(TEST_DIR), 'utf-8')).toBe(
                '{\n  "excluded_folders": [\n    "Personal",\n    "HR"\n  ],\n  "updated_at": "2024-05-01T12:00:00.000Z"\n}\n'
            );
        });

        it('should ignore malformed or invalid sidecars', () => {
            writeFileSync(getSyncConfigPath(TEST_DIR), '{ not json');
            expect(loadSyncConfig(TEST_DIR, logger)).toBeNull();

            writeFileSync(getSyncConfigPath(TEST_DIR), JSON.stringify({ excluded_folders: 'Personal' }));
            expect(loadSyncConfig(TEST_DIR, logger)).toBeNull();
        });

        it('should fill in missing fields', () => {
            writeFileSync(getSyncConfigPath(TEST_DIR), '{}');
            expect(loadSyncConfig(TEST_DIR, logger)).toEqual({ excluded_folders: [], updated_at: '' });
        });

        it('should merge against the file on disk', () => {
            saveSyncConfig(TEST_DIR, ['Shared'], new Date('2030-01-01T00:00:00Z'));

            const effective = getEffectiveExclusions(
                TEST_DIR,
                { excludedFolders: [], updatedAt: '2024-01-01T00:00:00Z' },
                logger
            );

            expect(effective).toEqual({
                excludedFolders: ['Shared'],
                origin: 'sidecar',
                updatedAt: '2030-01-01T00:00:00.000Z',
            });
        });
    });
});
