import { existsSync } from 'fs';
import { join } from 'path';
import { defaultCodec } from '../utils/filename.js';
import type { FilenameCodec } from '../utils/filename.js';
import type { Logger } from '../utils/logger.js';
import { readDirectory } from '../utils/walk.js';

/**
 * Short id -> absolute paths of the files currently carrying that id
 */
export type ExistingFiles = Map<string, string[]>;

/**
 * Directory scanner - walks the output tree and indexes synced files by short id
 */
export class DirectoryScanner {
    constructor(private codec: FilenameCodec = defaultCodec, private logger?: Logger) { }

    /**
     * Scan the output root. Files whose names do not decode are left out,
     * which also keeps them out of orphan cleanup. Symlinks are neither
     * indexed nor followed.
     */
    scan(root: string): ExistingFiles {
        const existing: ExistingFiles = new Map();
        if (existsSync(root)) {
            this.scanRecursive(root, existing);
        }
        return existing;
    }

    private scanRecursive(dir: string, existing: ExistingFiles): void {
        for (const entry of readDirectory(dir, this.logger)) {
            const absolutePath = join(dir, entry.name);

            if (entry.isDirectory()) {
                this.scanRecursive(absolutePath, existing);
            } else if (entry.isFile() && entry.name.endsWith(this.codec.extension)) {
                const id = this.codec.decode(entry.name);
                if (!id) continue;

                const paths = existing.get(id) ?? [];
                paths.push(absolutePath);
                existing.set(id, paths);
            }
        }
    }
}
