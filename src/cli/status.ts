import { openSettings } from './context.js';

export function showStatus(): void {
    const settings = openSettings().getSettings();

    console.log(`Output folder: ${settings.outputFolder ?? '(not set)'}`);
    console.log(`Source:        ${settings.sourcePath ?? '(not set)'} [${settings.sourceType}]`);
    console.log(`Excluded:      ${settings.excludedFolders.length > 0 ? settings.excludedFolders.join(', ') : '(none)'}`);
    console.log(`Webhooks:      ${settings.webhooks.filter(w => w.enabled).length} enabled of ${settings.webhooks.length}`);
    console.log('');

    const last = settings.lastSync;
    if (!last) {
        console.log('Never synced');
        return;
    }

    console.log(`Last sync: ${last.time} (${last.status})`);
    if (last.message) {
        console.log(`  ${last.message}`);
    }
    if (last.stats) {
        console.log(`  skipped: ${last.stats.skipped}`);
    }
}
