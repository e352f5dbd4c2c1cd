import { SyncEngine } from '../core/sync-engine.js';
import { buildLogicalDocuments } from '../core/documents.js';
import { createDocumentSource } from '../core/source-manager.js';
import { getEffectiveExclusions, saveSyncConfig } from '../core/sync-config.js';
import { acquireSyncLock } from '../core/sync-lock.js';
import { WebhookNotifier, summarize } from '../notify/webhooks.js';
import type { FetchLike, WebhookOutcome } from '../notify/webhooks.js';
import type { SyncOutcome } from '../types/index.js';
import type { SettingsStore } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { expandPath } from '../utils/home.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { openSettings, selectSource } from './context.js';
import type { SourceOptions } from './context.js';

export interface SyncOptions extends SourceOptions {
    output?: string;
    verbose?: boolean;
    quiet?: boolean;
}

export interface SyncContext {
    settings: SettingsStore;
    logger: Logger;
    fetch?: FetchLike;
    now?: () => Date;
}

export interface SyncReport {
    root: string;
    documentCount: number;
    excludedFolders: string[];
    exclusionOrigin: 'local' | 'sidecar';
    outcome: SyncOutcome;
    webhooks: WebhookOutcome[];
}

/**
 * One sync pass: lock the output root, merge exclusions, load documents,
 * reconcile, persist the shared config and report to webhooks.
 */
export async function runSync(options: SyncOptions, context: SyncContext): Promise<SyncReport> {
    const { settings, logger } = context;
    const now = context.now ?? (() => new Date());

    const outputFolder = options.output ?? settings.get('outputFolder');
    if (!outputFolder) {
        throw new Error('Output folder not set. Use --output or `notesync config set outputFolder <dir>`');
    }
    const selection = selectSource(options, settings);

    const root = expandPath(outputFolder);
    const engine = new SyncEngine(root, { logger });

    try {
        engine.ensureRoot();
    } catch (error) {
        recordFailure(settings, error, now());
        throw error;
    }

    // lastSync belongs to whichever pass holds the lock
    const lock = acquireSyncLock(root, logger);

    try {
        const exclusions = getEffectiveExclusions(root, {
            excludedFolders: settings.get('excludedFolders'),
            updatedAt: settings.get('excludedFoldersUpdated'),
        }, logger);
        if (exclusions.origin === 'sidecar') {
            logger.info(`Adopting excluded folders from sync folder: ${exclusions.excludedFolders.join(', ') || '(none)'}`);
            settings.update({
                excludedFolders: exclusions.excludedFolders,
                excludedFoldersUpdated: exclusions.updatedAt,
            });
        }

        const source = createDocumentSource(selection.type, selection.path);
        logger.info(`Reading documents from ${source.getRoot()} (${source.type})`);
        const sourceDocs = await source.load();
        const { documents, knownIds } = buildLogicalDocuments(sourceDocs, logger, now());
        logger.info(`Syncing ${documents.length} documents to ${root}`);

        const outcome = engine.sync(documents, knownIds, exclusions.excludedFolders);
        saveSyncConfig(root, exclusions.excludedFolders, now());

        const { stats } = outcome;
        settings.set('lastSync', {
            time: now().toISOString(),
            status: 'success',
            message: `${stats.added} added, ${stats.updated} updated, ${stats.moved} moved, ${stats.deleted} deleted`,
            stats: { ...stats },
        });

        const notifier = new WebhookNotifier(settings.get('webhooks'), { fetch: context.fetch, logger });
        const webhooks = await notifier.notify(outcome.results, documents);

        return {
            root,
            documentCount: documents.length,
            excludedFolders: exclusions.excludedFolders,
            exclusionOrigin: exclusions.origin,
            outcome,
            webhooks,
        };
    } catch (error) {
        recordFailure(settings, error, now());
        throw error;
    } finally {
        lock.release();
    }
}

function recordFailure(settings: SettingsStore, error: unknown, time: Date): void {
    settings.set('lastSync', {
        time: time.toISOString(),
        status: 'error',
        message: errorMessage(error),
    });
}

/**
 * Sync command handler
 */
export async function syncCommand(options: SyncOptions): Promise<void> {
    const logger = createLogger(options);
    const settings = openSettings(logger);

    const report = await runSync(options, { settings, logger });
    const { stats } = report.outcome;

    console.log('Sync results:');
    console.log(`  ${'added'.padEnd(10)}: ${stats.added}`);
    console.log(`  ${'updated'.padEnd(10)}: ${stats.updated}`);
    console.log(`  ${'moved'.padEnd(10)}: ${stats.moved}`);
    console.log(`  ${'deleted'.padEnd(10)}: ${stats.deleted}`);
    console.log(`  ${'skipped'.padEnd(10)}: ${stats.skipped}`);
    if (report.excludedFolders.length > 0) {
        console.log(`  Excluded folders: ${report.excludedFolders.join(', ')}`);
    }
    if (report.webhooks.length > 0) {
        console.log(`  ${summarize(report.webhooks)}`);
    }

    const changes = stats.added + stats.updated + stats.moved + stats.deleted;
    if (changes === 0) {
        console.log('  No changes, output folder is up to date');
    } else {
        console.log(`\n✓ ${changes} changes synced to ${report.root}`);
    }
}
