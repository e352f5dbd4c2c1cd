import type { SettingsStore } from '../utils/config.js';
import { openSettings } from './context.js';

/**
 * Add or remove one folder from the exclusion list. Returns false when
 * nothing changed, so the timestamp is only bumped by real edits.
 */
export function updateExclusions(settings: SettingsStore, action: 'add' | 'remove', folder: string): boolean {
    const current = settings.get('excludedFolders');
    const name = folder.trim();

    if (action === 'add') {
        if (current.includes(name)) return false;
        settings.setExcludedFolders([...current, name]);
        return true;
    }

    if (!current.includes(name)) return false;
    settings.setExcludedFolders(current.filter(existing => existing !== name));
    return true;
}

/**
 * Handle exclude command
 */
export function handleExclude(action: string, folder?: string): void {
    const settings = openSettings();

    switch (action) {
        case 'list': {
            const excluded = settings.get('excludedFolders');
            if (excluded.length === 0) {
                console.log('No excluded folders');
            } else {
                console.log('Excluded folders:');
                excluded.forEach(name => console.log(`  ${name}`));
            }
            break;
        }
        case 'add':
        case 'remove':
            if (!folder || !folder.trim()) {
                throw new Error(`Usage: notesync exclude ${action} <folder>`);
            }
            if (updateExclusions(settings, action, folder)) {
                console.log(`✓ ${action === 'add' ? 'Excluded' : 'Included'} folder '${folder.trim()}'`);
            } else {
                console.log(`Folder '${folder.trim()}' is already ${action === 'add' ? 'excluded' : 'included'}`);
            }
            break;
        default:
            throw new Error('Unknown exclude action. Use: list, add, remove');
    }
}
