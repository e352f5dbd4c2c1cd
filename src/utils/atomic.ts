import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname, basename, join } from 'path';

/**
 * Write a file through a temp file and rename, so readers never observe a
 * partially written file.
 */
export function writeFileAtomic(path: string, content: string): void {
    const dir = dirname(path);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }

    const tempPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
    try {
        writeFileSync(tempPath, content, 'utf-8');
        renameSync(tempPath, path);
    } catch (error) {
        rmSync(tempPath, { force: true });
        throw error;
    }
}
