import {
    accessSync,
    constants,
    existsSync,
    mkdirSync,
    readdirSync,
    rmdirSync,
    statSync,
    unlinkSync,
    writeFileSync,
} from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { DirectoryScanner } from './scanner.js';
import type { ExistingFiles } from './scanner.js';
import { resolveTargetPaths } from './paths.js';
import { applyExclusions, purgeExcludedFolders } from './exclusion.js';
import { defaultCodec } from '../utils/filename.js';
import type { FilenameCodec } from '../utils/filename.js';
import { Logger } from '../utils/logger.js';
import { SyncError, errorMessage, isSyncError } from '../utils/errors.js';
import { isNewerThanFile } from '../utils/staleness.js';
import { readDirectory } from '../utils/walk.js';
import { emptyStats } from '../types/index.js';
import type { LogicalDocument, SyncOutcome, SyncResult, SyncStats } from '../types/index.js';

export interface SyncEngineOptions {
    logger?: Logger;
    codec?: FilenameCodec;
}

/**
 * Sync Engine - reconciles the output folder tree with a set of documents.
 *
 * No manifest is kept: the short id in each filename ties a file to its
 * document, and the file's mtime tells whether the document changed since
 * it was written. Individual file failures are logged and skipped; only a
 * root that cannot be created or written aborts the pass.
 */
export class SyncEngine {
    private readonly root: string;
    private readonly codec: FilenameCodec;
    private readonly scanner: DirectoryScanner;
    private readonly logger: Logger;

    constructor(root: string, options: SyncEngineOptions = {}) {
        this.root = resolve(root);
        this.codec = options.codec ?? defaultCodec;
        this.logger = options.logger ?? new Logger();
        this.scanner = new DirectoryScanner(this.codec, this.logger);
    }

    getRoot(): string {
        return this.root;
    }

    /**
     * Synchronize documents into the output root.
     *
     * @param knownIds every document id the source still has, including
     *        documents not passed in for writing; used for orphan detection
     * @param excludedFolders folder names whose directories are purged and
     *        which are removed from each document's folder list
     */
    sync(
        documents: LogicalDocument[],
        knownIds: Iterable<string>,
        excludedFolders: Iterable<string> = []
    ): SyncOutcome {
        const stats = emptyStats();
        const results: SyncResult[] = [];
        const excluded = new Set(excludedFolders);

        this.ensureRoot();

        // 1. Purge excluded folders so exclusions take effect without a document change
        for (const path of purgeExcludedFolders(this.root, excluded, this.logger)) {
            stats.deleted++;
            results.push({ documentId: this.codec.decode(basename(path)), action: 'deleted', path });
        }

        // 2. Index what is already on disk
        const existing = this.scanner.scan(this.root);

        // 3. Reconcile each document; processed ids are removed from the index
        for (const doc of documents) {
            this.processDocument(applyExclusions(excluded, doc), existing, stats, results);
        }

        // 4. Whatever is left belongs to no current document
        this.deleteOrphans(existing, new Set(knownIds), stats, results);

        // 5. Prune directories emptied by the deletions above
        this.pruneEmptyDirectories(this.root);

        this.logger.debug(
            `Sync finished: added=${stats.added}, updated=${stats.updated}, moved=${stats.moved}, ` +
            `deleted=${stats.deleted}, skipped=${stats.skipped}`
        );

        return { stats, results };
    }

    /**
     * Create the output root if needed and check it can be written
     */
    ensureRoot(): void {
        try {
            mkdirSync(this.root, { recursive: true });
        } catch (error) {
            throw new SyncError('io-fatal', `Failed to create output folder '${this.root}': ${errorMessage(error)}`, {
                path: this.root,
                cause: error,
            });
        }

        if (!statSync(this.root).isDirectory()) {
            throw new SyncError('io-fatal', `Output path '${this.root}' exists but is not a directory`, {
                path: this.root,
            });
        }

        try {
            accessSync(this.root, constants.W_OK | constants.X_OK);
        } catch (error) {
            throw new SyncError('io-fatal', `Output folder '${this.root}' is not writable`, {
                path: this.root,
                cause: error,
            });
        }
    }

    private processDocument(
        doc: LogicalDocument,
        existing: ExistingFiles,
        stats: SyncStats,
        results: SyncResult[]
    ): void {
        const id = this.codec.shortId(doc.id);
        const filename = this.codec.encode(doc.title, doc.id, doc.createdAt);

        const existingPaths = existing.get(id) ?? [];
        existing.delete(id);

        const targetPaths = resolveTargetPaths(doc.folders, filename, this.root);
        const existingSet = new Set(existingPaths);
        const targetSet = new Set(targetPaths);

        for (const targetPath of targetPaths) {
            try {
                if (!existingSet.has(targetPath)) {
                    this.writeFile(targetPath, doc.body);
                    this.logger.debug(`Added: ${targetPath}`);
                    stats.added++;
                    results.push({ documentId: doc.id, action: 'added', path: targetPath });
                } else if (isNewerThanFile(targetPath, doc.updatedAt, this.logger)) {
                    this.writeFile(targetPath, doc.body);
                    this.logger.debug(`Updated: ${targetPath}`);
                    stats.updated++;
                    results.push({ documentId: doc.id, action: 'updated', path: targetPath });
                } else {
                    stats.skipped++;
                }
            } catch (error) {
                if (!isSyncError(error, 'io-transient')) throw error;
                this.logger.warn(error.message);
            }
        }

        // Files in folders the document has left; the new copies were written above
        for (const existingPath of existingPaths) {
            if (targetSet.has(existingPath)) continue;

            this.logger.debug(`Removing from old folder: ${existingPath}`);
            if (this.removeFile(existingPath)) {
                stats.moved++;
                results.push({ documentId: doc.id, action: 'deleted', path: existingPath });
            }
        }
    }

    private writeFile(path: string, content: string): void {
        try {
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, content, 'utf-8');
        } catch (error) {
            throw new SyncError('io-transient', `Failed to write ${path}: ${errorMessage(error)}`, {
                path,
                cause: error,
            });
        }
    }

    /**
     * Short ids are matched against full ids by prefix
     */
    private deleteOrphans(
        existing: ExistingFiles,
        knownIds: Set<string>,
        stats: SyncStats,
        results: SyncResult[]
    ): void {
        for (const [id, paths] of existing) {
            if (this.isKnown(id, knownIds)) continue;

            for (const path of paths) {
                this.logger.debug(`Deleting orphan: ${path} (id: ${id})`);
                if (this.removeFile(path)) {
                    stats.deleted++;
                    results.push({ documentId: id, action: 'deleted', path });
                }
            }
        }
    }

    private isKnown(id: string, knownIds: Set<string>): boolean {
        for (const fullId of knownIds) {
            if (fullId.startsWith(id)) return true;
        }
        return false;
    }

    private removeFile(path: string): boolean {
        try {
            unlinkSync(path);
            return true;
        } catch (error) {
            this.logger.warn(`Failed to delete ${path}: ${errorMessage(error)}`);
            return false;
        }
    }

    /**
     * Remove empty directories deepest first; the root itself is kept
     */
    private pruneEmptyDirectories(dir: string): void {
        if (!existsSync(dir)) return;

        for (const entry of readDirectory(dir, this.logger)) {
            if (entry.isDirectory()) {
                this.pruneEmptyDirectories(join(dir, entry.name));
            }
        }

        if (dir === this.root) return;

        try {
            if (readdirSync(dir).length === 0) {
                rmdirSync(dir);
                this.logger.debug(`Removing empty folder: ${dir}`);
            }
        } catch (error) {
            this.logger.debug(`Could not remove folder ${dir}: ${errorMessage(error)}`);
        }
    }
}
