/**
 * @perch/core: AppSettingsService contract
 */

import type { Theme } from '@perch/shared';

export interface AppSettingsService {
    getDefaultProfileId(): Promise<string | null>;
    setDefaultProfileId(id: string | null): Promise<void>;
    getCurrentConversationId(): Promise<string | null>;
    setCurrentConversationId(id: string | null): Promise<void>;
    getHotkey(): Promise<string>;
    setHotkey(hotkey: string): Promise<void>;
    getTheme(): Promise<Theme>;
    setTheme(theme: Theme): Promise<void>;
    resetToDefaults(): Promise<void>;
}
