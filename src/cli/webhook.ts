import { WebhookConfigSchema } from '../types/index.js';
import type { WebhookConfig } from '../types/index.js';
import type { SettingsStore } from '../utils/config.js';
import { openSettings } from './context.js';

export interface WebhookOptions {
    url?: string;
    method?: string;
    folder?: string[];
}

/**
 * Validate and store a new webhook; names are unique
 */
export function addWebhook(settings: SettingsStore, name: string, options: WebhookOptions): WebhookConfig {
    const webhooks = settings.get('webhooks');
    if (webhooks.some(webhook => webhook.name === name)) {
        throw new Error(`Webhook '${name}' already exists`);
    }

    const parsed = WebhookConfigSchema.safeParse({
        name,
        url: options.url,
        method: options.method,
        folders: options.folder ?? [],
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid webhook '${name}': ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`);
    }

    settings.set('webhooks', [...webhooks, parsed.data]);
    return parsed.data;
}

function requireWebhook(settings: SettingsStore, name: string): WebhookConfig[] {
    const webhooks = settings.get('webhooks');
    if (!webhooks.some(webhook => webhook.name === name)) {
        throw new Error(`Webhook '${name}' not found`);
    }
    return webhooks;
}

export function removeWebhook(settings: SettingsStore, name: string): void {
    const webhooks = requireWebhook(settings, name);
    settings.set('webhooks', webhooks.filter(webhook => webhook.name !== name));
}

export function setWebhookEnabled(settings: SettingsStore, name: string, enabled: boolean): void {
    const webhooks = requireWebhook(settings, name);
    settings.set('webhooks', webhooks.map(webhook => (webhook.name === name ? { ...webhook, enabled } : webhook)));
}

/**
 * Handle webhook command
 */
export function handleWebhook(action: string, name: string | undefined, options: WebhookOptions): void {
    const settings = openSettings();

    if (action === 'list') {
        const webhooks = settings.get('webhooks');
        if (webhooks.length === 0) {
            console.log('No webhooks configured');
            return;
        }
        console.log('Webhooks:');
        webhooks.forEach(webhook => {
            const filter = webhook.folders.length > 0 ? ` folders: ${webhook.folders.join(', ')}` : '';
            console.log(`  ${webhook.name.padEnd(15)} ${webhook.method.padEnd(5)} ${webhook.url}${webhook.enabled ? '' : ' (disabled)'}${filter}`);
        });
        return;
    }

    if (!name) {
        throw new Error(`Usage: notesync webhook ${action} <name>`);
    }

    switch (action) {
        case 'add':
            addWebhook(settings, name, options);
            console.log(`✓ Added webhook '${name}'`);
            break;
        case 'remove':
            removeWebhook(settings, name);
            console.log(`✓ Removed webhook '${name}'`);
            break;
        case 'enable':
        case 'disable':
            setWebhookEnabled(settings, name, action === 'enable');
            console.log(`✓ ${action === 'enable' ? 'Enabled' : 'Disabled'} webhook '${name}'`);
            break;
        default:
            throw new Error('Unknown webhook action. Use: list, add, remove, enable, disable');
    }
}
