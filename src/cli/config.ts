import { parseSourceType } from '../core/source-manager.js';
import type { SettingsStore } from '../utils/config.js';
import { expandPath } from '../utils/home.js';
import { openSettings } from './context.js';

const SETTABLE_KEYS = ['outputFolder', 'sourcePath', 'sourceType'] as const;

type SettableKey = typeof SETTABLE_KEYS[number];

function isSettableKey(key: string): key is SettableKey {
    return SETTABLE_KEYS.some(candidate => candidate === key);
}

/**
 * Apply `config set <key> <value>` and return the stored value; paths are stored expanded
 */
export function setConfigValue(settings: SettingsStore, key: string, value: string): string {
    if (!isSettableKey(key)) {
        throw new Error(`Unknown setting '${key}'. Use one of: ${SETTABLE_KEYS.join(', ')}`);
    }

    switch (key) {
        case 'outputFolder':
        case 'sourcePath': {
            const path = expandPath(value);
            settings.set(key, path);
            return path;
        }
        case 'sourceType': {
            const type = parseSourceType(value);
            settings.set('sourceType', type);
            return type;
        }
    }
}

/**
 * Handle config command
 */
export function handleConfig(action: string, key?: string, value?: string): void {
    const settings = openSettings();

    switch (action) {
        case 'show': {
            const current = settings.getSettings();
            for (const name of SETTABLE_KEYS) {
                console.log(`${name.padEnd(14)}: ${current[name] ?? '(not set)'}`);
            }
            break;
        }
        case 'set':
            if (!key || value === undefined) {
                throw new Error('Usage: notesync config set <key> <value>');
            }
            console.log(`✓ Set ${key} = ${setConfigValue(settings, key, value)}`);
            break;
        default:
            throw new Error('Unknown config action. Use: show, set');
    }
}
