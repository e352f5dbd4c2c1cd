#!/usr/bin/env node

import { Command } from 'commander';
import { syncCommand } from './cli/sync.js';
import type { SyncOptions } from './cli/sync.js';
import { notesCommand } from './cli/notes.js';
import type { ExportOptions } from './cli/notes.js';
import { transcriptsCommand } from './cli/transcripts.js';
import { showStatus } from './cli/status.js';
import { handleConfig } from './cli/config.js';
import { handleExclude } from './cli/exclude.js';
import { handleWebhook } from './cli/webhook.js';
import type { WebhookOptions } from './cli/webhook.js';
import { errorMessage } from './utils/errors.js';

function fail(error: unknown): never {
    console.error('Error:', errorMessage(error));
    process.exit(1);
}

const program = new Command();

program
    .name('notesync')
    .description('Sync exported notes and transcripts into a folder tree of text files')
    .version('0.1.0');

// sync command
program
    .command('sync')
    .description('Sync documents into the output folder')
    .option('-o, --output <dir>', 'Output folder (overrides settings)')
    .option('-s, --source <file>', 'Documents file to read (overrides settings)')
    .option('-t, --type <type>', 'Source type (export|cache)')
    .option('-v, --verbose', 'Log every file operation')
    .option('-q, --quiet', 'Only log warnings and errors')
    .action(async (options: SyncOptions) => {
        try {
            await syncCommand(options);
        } catch (error) {
            fail(error);
        }
    });

// notes command
program
    .command('notes')
    .description('Export notes as markdown files into a single folder')
    .option('-o, --output <dir>', 'Output folder', './notes')
    .option('-s, --source <file>', 'Documents file to read (overrides settings)')
    .option('-t, --type <type>', 'Source type (export|cache)')
    .option('-v, --verbose', 'Log every file operation')
    .option('-q, --quiet', 'Only log warnings and errors')
    .action(async (options: ExportOptions) => {
        try {
            await notesCommand(options);
        } catch (error) {
            fail(error);
        }
    });

// transcripts command
program
    .command('transcripts')
    .description('Export transcripts as text files into a single folder')
    .option('-o, --output <dir>', 'Output folder', './transcripts')
    .option('-s, --source <file>', 'Documents file to read (overrides settings)')
    .option('-t, --type <type>', 'Source type (export|cache)')
    .option('-v, --verbose', 'Log every file operation')
    .option('-q, --quiet', 'Only log warnings and errors')
    .action(async (options: ExportOptions) => {
        try {
            await transcriptsCommand(options);
        } catch (error) {
            fail(error);
        }
    });

// status command
program
    .command('status')
    .description('Show settings and the result of the last sync')
    .action(() => {
        try {
            showStatus();
        } catch (error) {
            fail(error);
        }
    });

// config command
program
    .command('config')
    .description('Show or change settings (outputFolder, sourcePath, sourceType)')
    .argument('<action>', 'Action (show|set)')
    .argument('[key]', 'Setting name')
    .argument('[value]', 'New value')
    .action((action: string, key?: string, value?: string) => {
        try {
            handleConfig(action, key, value);
        } catch (error) {
            fail(error);
        }
    });

// exclude command
program
    .command('exclude')
    .description('Manage folders excluded from sync')
    .argument('<action>', 'Action (list|add|remove)')
    .argument('[folder]', 'Folder name as shown in the notes app')
    .action((action: string, folder?: string) => {
        try {
            handleExclude(action, folder);
        } catch (error) {
            fail(error);
        }
    });

// webhook command
program
    .command('webhook')
    .description('Manage webhooks notified about created and updated documents')
    .argument('<action>', 'Action (list|add|remove|enable|disable)')
    .argument('[name]', 'Webhook name')
    .option('--url <url>', 'Endpoint URL')
    .option('--method <method>', 'HTTP method (GET|POST|PUT|PATCH)', 'POST')
    .option('--folder <name...>', 'Only fire for documents in these folders')
    .action((action: string, name: string | undefined, options: WebhookOptions) => {
        try {
            handleWebhook(action, name, options);
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch(fail);
