/**
 * @perch/core: Config-backed AppSettingsService
 *
 * Reads and writes preferences through a SettingsStore: the Settings
 * config file in production, an in-memory store in tests.
 */

import { AppEvents, ServiceError, Settings, describeError } from '@perch/shared';
import type { AppEvent, PerchConfig, SystemEvent, Theme } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { AppSettingsService } from '../app-settings-service.js';

export interface SettingsStore {
    read(): PerchConfig;
    update(patch: Partial<PerchConfig>): PerchConfig;
}

/** Store kept in memory; nothing touches disk */
export function memorySettingsStore(initial: Partial<PerchConfig> = {}): SettingsStore {
    let config: PerchConfig = { ...Settings.defaults(), ...initial };
    return {
        read: () => config,
        update: (patch) => {
            config = { ...config, ...patch };
            return config;
        },
    };
}

export class ConfigAppSettingsService implements AppSettingsService {
    constructor(
        private readonly events: EventPublisher<AppEvent>,
        private readonly store: SettingsStore = Settings,
    ) {}

    async getDefaultProfileId(): Promise<string | null> {
        return this.store.read().defaultProfileId;
    }

    async setDefaultProfileId(id: string | null): Promise<void> {
        this.save({ defaultProfileId: id });
    }

    async getCurrentConversationId(): Promise<string | null> {
        return this.store.read().currentConversationId;
    }

    async setCurrentConversationId(id: string | null): Promise<void> {
        this.save({ currentConversationId: id });
    }

    async getHotkey(): Promise<string> {
        return this.store.read().hotkey;
    }

    async setHotkey(hotkey: string): Promise<void> {
        if (!hotkey.trim()) throw ServiceError.validation('Hotkey cannot be empty');
        this.save({ hotkey }, { type: 'hotkey_changed', hotkey });
    }

    async getTheme(): Promise<Theme> {
        return this.store.read().theme;
    }

    async setTheme(theme: Theme): Promise<void> {
        this.save({ theme }, { type: 'theme_changed', theme });
    }

    async resetToDefaults(): Promise<void> {
        const defaults = Settings.defaults();
        this.save(
            {
                hotkey: defaults.hotkey,
                theme: defaults.theme,
                defaultProfileId: defaults.defaultProfileId,
                currentConversationId: defaults.currentConversationId,
            },
            { type: 'hotkey_changed', hotkey: defaults.hotkey },
            { type: 'theme_changed', theme: defaults.theme },
        );
    }

    private save(patch: Partial<PerchConfig>, ...changes: SystemEvent[]): void {
        try {
            this.store.update(patch);
        } catch (err) {
            throw ServiceError.storage(`Could not save settings: ${describeError(err)}`, err);
        }
        this.events.publish(AppEvents.system({ type: 'config_saved' }));
        for (const change of changes) this.events.publish(AppEvents.system(change));
    }
}
