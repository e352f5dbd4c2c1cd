import type { LogicalDocument, SyncResult, WebhookConfig } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const WEBHOOK_TIMEOUT_MS = 10_000;

export type WebhookEvent = 'document.created' | 'document.updated';

export interface WebhookPayload {
    event: WebhookEvent;
    timestamp: string;
    document: {
        id: string;
        title: string;
        created_at: string;
        updated_at: string;
        folders: string[];
        file_path: string;
        content: string;
        webhook_folder_filters: string[];
    };
}

export interface WebhookOutcome {
    webhookName: string;
    documentId: string;
    event: WebhookEvent;
    success: boolean;
    statusCode?: number;
    errorMessage?: string;
}

export interface FetchRequest {
    method: string;
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
}

export type FetchLike = (url: string, init: FetchRequest) => Promise<{ ok: boolean; status: number }>;

export interface WebhookNotifierOptions {
    fetch?: FetchLike;
    logger?: Logger;
    timeoutMs?: number;
    now?: () => Date;
}

/**
 * A webhook without a folder filter fires for every document
 */
export function matchesFolder(config: WebhookConfig, docFolders: string[]): boolean {
    if (config.folders.length === 0) return true;
    return config.folders.some(folder => docFolders.includes(folder));
}

export function buildPayload(
    event: WebhookEvent,
    doc: LogicalDocument,
    filePath: string,
    folderFilters: string[],
    now: Date = new Date()
): WebhookPayload {
    return {
        event,
        timestamp: now.toISOString(),
        document: {
            id: doc.id,
            title: doc.title,
            created_at: doc.createdAt,
            updated_at: doc.updatedAt.toISOString(),
            folders: [...doc.folders],
            file_path: filePath,
            content: doc.body,
            webhook_folder_filters: [...folderFilters],
        },
    };
}

/**
 * Webhook notifier - announces created and updated documents after a sync.
 * Deletions are not announced. Failures are reported, never retried.
 */
export class WebhookNotifier {
    private fetchImpl: FetchLike;
    private logger: Logger;
    private timeoutMs: number;
    private now: () => Date;

    constructor(private webhooks: WebhookConfig[], options: WebhookNotifierOptions = {}) {
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
        this.logger = options.logger ?? new Logger();
        this.timeoutMs = options.timeoutMs ?? WEBHOOK_TIMEOUT_MS;
        this.now = options.now ?? (() => new Date());
    }

    async notify(results: SyncResult[], documents: LogicalDocument[]): Promise<WebhookOutcome[]> {
        const active = this.webhooks.filter(webhook => {
            if (!webhook.enabled) this.logger.debug(`Skipping disabled webhook: ${webhook.name}`);
            return webhook.enabled;
        });
        if (active.length === 0) return [];

        const byId = new Map(documents.map(doc => [doc.id, doc]));

        // One event per document; a document written to several folders reports its first path
        const events = new Map<string, { event: WebhookEvent; path: string }>();
        for (const result of results) {
            if (result.action === 'deleted' || events.has(result.documentId)) continue;
            events.set(result.documentId, {
                event: result.action === 'added' ? 'document.created' : 'document.updated',
                path: result.path,
            });
        }

        const outcomes: WebhookOutcome[] = [];
        for (const [documentId, { event, path }] of events) {
            const doc = byId.get(documentId);
            if (!doc) continue;

            for (const webhook of active) {
                if (!matchesFolder(webhook, doc.folders)) {
                    this.logger.debug(`Skipping webhook '${webhook.name}' for ${documentId}: folder filter does not match`);
                    continue;
                }
                const payload = buildPayload(event, doc, path, webhook.folders, this.now());
                outcomes.push(await this.send(webhook, payload));
            }
        }
        return outcomes;
    }

    async send(webhook: WebhookConfig, payload: WebhookPayload): Promise<WebhookOutcome> {
        const base = { webhookName: webhook.name, documentId: payload.document.id, event: payload.event };
        const signal = AbortSignal.timeout(this.timeoutMs);

        try {
            let response: { ok: boolean; status: number };
            if (webhook.method === 'GET') {
                // Only metadata travels in the query string
                const url = new URL(webhook.url);
                url.searchParams.set('event', payload.event);
                url.searchParams.set('id', payload.document.id);
                url.searchParams.set('title', payload.document.title);
                response = await this.fetchImpl(url.toString(), { method: 'GET', signal });
            } else {
                response = await this.fetchImpl(webhook.url, {
                    method: webhook.method,
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                    signal,
                });
            }

            if (!response.ok) {
                this.logger.warn(`Webhook '${webhook.name}' returned HTTP ${response.status}`);
                return { ...base, success: false, statusCode: response.status, errorMessage: `HTTP ${response.status}` };
            }

            this.logger.debug(`Webhook '${webhook.name}' sent successfully: ${response.status}`);
            return { ...base, success: true, statusCode: response.status };
        } catch (error) {
            this.logger.warn(`Webhook '${webhook.name}' failed: ${errorMessage(error)}`);
            return { ...base, success: false, errorMessage: errorMessage(error) };
        }
    }
}

export function summarize(outcomes: WebhookOutcome[]): string {
    if (outcomes.length === 0) return 'No webhooks sent';

    const sent = outcomes.filter(outcome => outcome.success).length;
    const failed = outcomes.length - sent;
    return failed === 0 ? `Webhooks: ${sent} sent` : `Webhooks: ${sent} sent, ${failed} failed`;
}
