import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync, symlinkSync } from 'fs';
import { join } from 'path';
import { DirectoryScanner } from '../src/core/scanner.js';
import { resolveTargetPaths, UNCATEGORIZED_FOLDER } from '../src/core/paths.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'scanner');
const OUTSIDE = join(process.cwd(), 'tests', 'tmp', 'scanner-outside');

function touch(...segments: string[]): string {
    const path = join(TEST_DIR, ...segments);
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, 'content');
    return path;
}

describe('Directory Scanner', () => {
    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });
    });

    afterEach(() => {
        for (const dir of [TEST_DIR, OUTSIDE]) {
            if (existsSync(dir)) {
                rmSync(dir, { recursive: true });
            }
        }
    });

    it('should group synced files by short id', () => {
        const inA = touch('A', '2024-01-01_Standup_abcdef12.txt');
        const inB = touch('B', '2024-01-01_Standup_abcdef12.txt');
        const other = touch('Uncategorized', '2024-02-01_Review_12345678.txt');

        const existing = new DirectoryScanner().scan(TEST_DIR);

        expect(existing.size).toBe(2);
        expect(existing.get('abcdef12')).toEqual([inA, inB]);
        expect(existing.get('12345678')).toEqual([other]);
    });

    it('should ignore files it cannot decode', () => {
        touch('notes.txt');
        touch('A', 'todo_list.txt');
        touch('A', '2024-01-01_Standup_abcdef12.md');

        const existing = new DirectoryScanner().scan(TEST_DIR);

        expect(existing.size).toBe(0);
    });

    it('should walk nested directories', () => {
        const nested = touch('A', 'B', 'C', '2024-01-01_Deep_deadbeef.txt');

        const existing = new DirectoryScanner().scan(TEST_DIR);

        expect(existing.get('deadbeef')).toEqual([nested]);
    });

    it('should not follow symlinked directories', () => {
        mkdirSync(OUTSIDE, { recursive: true });
        writeFileSync(join(OUTSIDE, '2024-01-01_Mine_zzzzzzzz.txt'), 'content');
        symlinkSync(OUTSIDE, join(TEST_DIR, 'link'));

        const existing = new DirectoryScanner().scan(TEST_DIR);

        expect(existing.size).toBe(0);
    });

    it('should skip symlinked files and dangling links', () => {
        const real = touch('A', '2024-01-01_Standup_abcdef12.txt');
        symlinkSync(real, join(TEST_DIR, 'A', '2024-01-01_Copy_12345678.txt'));
        symlinkSync(join(TEST_DIR, 'nowhere'), join(TEST_DIR, 'dangling'));

        const existing = new DirectoryScanner().scan(TEST_DIR);

        expect([...existing.keys()]).toEqual(['abcdef12']);
    });

    it('should return an empty index for a missing root', () => {
        const existing = new DirectoryScanner().scan(join(TEST_DIR, 'missing'));
        expect(existing.size).toBe(0);
    });
});

describe('Folder Path Resolver', () => {
    const root = join('/', 'out');
    const filename = '2024-01-01_Standup_abcdef12.txt';

    it('should place folderless documents in Uncategorized', () => {
        expect(resolveTargetPaths([], filename, root)).toEqual([
            join(root, UNCATEGORIZED_FOLDER, filename),
        ]);
    });

    it('should return one path per folder in order', () => {
        expect(resolveTargetPaths(['Work', 'Clients'], filename, root)).toEqual([
            join(root, 'Work', filename),
            join(root, 'Clients', filename),
        ]);
    });

    it('should sanitize folder names', () => {
        expect(resolveTargetPaths(['Team/Projects'], filename, root)).toEqual([
            join(root, 'Team_Projects', filename),
        ]);
    });

    it('should merge folders that sanitize to the same name', () => {
        expect(resolveTargetPaths(['A/B', 'A:B', 'Other'], filename, root)).toEqual([
            join(root, 'A_B', filename),
            join(root, 'Other', filename),
        ]);
    });
});
