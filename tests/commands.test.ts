import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { SettingsStore } from '../src/utils/config.js';
import { Logger, LogLevel } from '../src/utils/logger.js';
import { setConfigValue } from '../src/cli/config.js';
import { updateExclusions } from '../src/cli/exclude.js';
import { addWebhook, removeWebhook, setWebhookEnabled } from '../src/cli/webhook.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'commands');

describe('CLI Commands', () => {
    let settings: SettingsStore;

    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });
        settings = new SettingsStore(join(TEST_DIR, 'settings.json'), new Logger(LogLevel.SILENT));
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    describe('config set', () => {
        it('should store expanded paths', () => {
            expect(setConfigValue(settings, 'outputFolder', '~/Notes')).toBe(join(homedir(), 'Notes'));
            expect(settings.get('outputFolder')).toBe(join(homedir(), 'Notes'));
        });

        it('should validate the source type', () => {
            expect(setConfigValue(settings, 'sourceType', 'cache')).toBe('cache');
            expect(() => setConfigValue(settings, 'sourceType', 'api')).toThrowError(
                'Unsupported source type: api (expected export|cache)'
            );
            expect(settings.get('sourceType')).toBe('cache');
        });

        it('should reject unknown keys', () => {
            expect(() => setConfigValue(settings, 'lastSync', 'x')).toThrowError(
                "Unknown setting 'lastSync'. Use one of: outputFolder, sourcePath, sourceType"
            );
        });
    });

    describe('exclude', () => {
        it('should add and remove folders', () => {
            expect(updateExclusions(settings, 'add', ' Personal ')).toBe(true);
            expect(updateExclusions(settings, 'add', 'HR')).toBe(true);
            expect(settings.get('excludedFolders')).toEqual(['Personal', 'HR']);

            expect(updateExclusions(settings, 'remove', 'Personal')).toBe(true);
            expect(settings.get('excludedFolders')).toEqual(['HR']);
        });

        it('should leave the timestamp alone when nothing changes', () => {
            updateExclusions(settings, 'add', 'HR');
            const stamped = settings.get('excludedFoldersUpdated');

            expect(updateExclusions(settings, 'add', 'HR')).toBe(false);
            expect(updateExclusions(settings, 'remove', 'Finance')).toBe(false);
            expect(settings.get('excludedFoldersUpdated')).toBe(stamped);
        });
    });

    describe('webhook', () => {
        it('should add a validated webhook', () => {
            const added = addWebhook(settings, 'hook', {
                url: 'https://example.test/hook',
                method: 'put',
                folder: ['Work'],
            });

            expect(added).toEqual({
                name: 'hook',
                url: 'https://example.test/hook',
                method: 'PUT',
                enabled: true,
                folders: ['Work'],
            });
            expect(settings.get('webhooks')).toEqual([added]);
        });

        it('should reject duplicates and invalid input', () => {
            addWebhook(settings, 'hook', { url: 'https://example.test/hook' });

            expect(() => addWebhook(settings, 'hook', { url: 'https://example.test/other' })).toThrowError(
                "Webhook 'hook' already exists"
            );
            expect(() => addWebhook(settings, 'bad', { url: 'not a url' })).toThrowError(
                "Invalid webhook 'bad': url: Invalid url"
            );
            expect(() => addWebhook(settings, 'verb', { url: 'https://example.test', method: 'DELETE' })).toThrowError(
                /^Invalid webhook 'verb': method: /
            );
        });

        it('should enable, disable and remove webhooks', () => {
            addWebhook(settings, 'hook', { url: 'https://example.test/hook' });

            setWebhookEnabled(settings, 'hook', false);
            expect(settings.get('webhooks')[0]?.enabled).toBe(false);

            removeWebhook(settings, 'hook');
            expect(settings.get('webhooks')).toEqual([]);

            expect(() => removeWebhook(settings, 'hook')).toThrowError("Webhook 'hook' not found");
            expect(() => setWebhookEnabled(settings, 'ghost', true)).toThrowError("Webhook 'ghost' not found");
        });
    });
});
