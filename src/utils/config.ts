import { existsSync, readFileSync } from 'fs';
import { SettingsSchema } from '../types/index.js';
import type { Settings } from '../types/index.js';
import { writeFileAtomic } from './atomic.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export type SettingsKey = keyof Settings;

export type SettingsListener = (key: SettingsKey, settings: Readonly<Settings>) => void;

/**
 * Settings store - local application settings persisted as JSON.
 *
 * Instances are created by the caller and passed to whatever needs them.
 * Every change is written atomically and then published to subscribers.
 */
export class SettingsStore {
    private settingsPath: string;
    private settings: Settings;
    private listeners = new Set<SettingsListener>();
    private logger?: Logger;

    constructor(settingsPath: string, logger?: Logger) {
        this.settingsPath = settingsPath;
        this.logger = logger;
        this.settings = this.load();
    }

    /**
     * Load settings from file, falling back to defaults when missing or invalid
     */
    private load(): Settings {
        if (!existsSync(this.settingsPath)) {
            return SettingsSchema.parse({});
        }

        try {
            const raw: unknown = JSON.parse(readFileSync(this.settingsPath, 'utf-8'));
            const parsed = SettingsSchema.safeParse(raw);
            if (parsed.success) {
                return parsed.data;
            }
            this.logger?.warn(`Invalid settings in ${this.settingsPath}, using defaults: ${parsed.error.message}`);
        } catch (error) {
            this.logger?.warn(`Failed to load settings from ${this.settingsPath}: ${errorMessage(error)}`);
        }
        return SettingsSchema.parse({});
    }

    /**
     * Save settings to file
     */
    save(): void {
        writeFileAtomic(this.settingsPath, JSON.stringify(this.settings, null, 2) + '\n');
    }

    get<K extends SettingsKey>(key: K): Settings[K] {
        return this.settings[key];
    }

    set<K extends SettingsKey>(key: K, value: Settings[K]): void {
        const next: Settings = { ...this.settings };
        next[key] = value;
        this.settings = next;
        this.save();
        this.publish([key]);
    }

    /**
     * Apply several changes with a single write
     */
    update(changes: Partial<Settings>): void {
        const next = SettingsSchema.parse({ ...this.settings, ...changes });
        const changed = SettingsSchema.keyof().options.filter(key => changes[key] !== undefined);
        this.settings = next;
        this.save();
        this.publish(changed);
    }

    /**
     * Replace the exclusion list and stamp it, so it can win the merge with the sync folder copy
     */
    setExcludedFolders(folders: string[], updatedAt: string = new Date().toISOString()): void {
        const unique = [...new Set(folders.map(folder => folder.trim()).filter(folder => folder.length > 0))];
        this.update({ excludedFolders: unique, excludedFoldersUpdated: updatedAt });
    }

    getSettings(): Settings {
        return structuredClone(this.settings);
    }

    /**
     * Subscribe to changes; returns the unsubscribe function
     */
    subscribe(listener: SettingsListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private publish(keys: SettingsKey[]): void {
        for (const key of keys) {
            for (const listener of this.listeners) {
                try {
                    listener(key, this.settings);
                } catch (error) {
                    this.logger?.warn(`Settings listener failed for '${key}': ${errorMessage(error)}`);
                }
            }
        }
    }
}
