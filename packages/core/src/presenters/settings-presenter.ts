/**
 * @perch/core: Settings Presenter
 *
 * Settings screen: profile list and default, MCP servers and their live
 * status, hotkey and theme.
 */

import type { AppEvent, McpEvent, McpServerSummary, ProfileEvent, ProfileSummary, SystemEvent, UserEvent } from '@perch/shared';
import type { AppSettingsService, McpService, ProfileService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export interface SettingsPresenterServices {
    readonly profiles: ProfileService;
    readonly appSettings: AppSettingsService;
    readonly mcp: McpService;
}

const TITLE = 'Settings Error';

export class SettingsPresenter extends Presenter {
    private readonly profiles: ProfileService;
    private readonly appSettings: AppSettingsService;
    private readonly mcp: McpService;

    constructor(context: PresenterContext, services: SettingsPresenterServices) {
        super('SettingsPresenter', context);
        this.profiles = services.profiles;
        this.appSettings = services.appSettings;
        this.mcp = services.mcp;
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        switch (event.type) {
            case 'user':
                return this.onUser(event.payload);
            case 'profile':
                return this.onProfile(event.payload);
            case 'mcp':
                return this.onMcp(event.payload);
            case 'system':
                return this.onSystem(event.payload);
            case 'navigation':
                if (event.payload.type === 'navigating' && event.payload.to === 'settings') await this.refresh();
                return;
            default:
                return;
        }
    }

    private async onUser(event: UserEvent): Promise<void> {
        switch (event.type) {
            case 'navigate':
                if (event.to === 'settings') await this.refresh();
                return;

            case 'select_profile':
                await this.attempt(TITLE, () => this.profiles.setDefault(event.id));
                return;

            case 'toggle_mcp':
                await this.attempt('MCP Error', () => this.mcp.setEnabled(event.id, event.enabled));
                return;

            case 'delete_profile':
                this.showModal('confirm_delete_profile', event.id);
                return;

            case 'confirm_delete_profile': {
                const deleted = await this.attempt('Delete Failed', () => this.profiles.delete(event.id));
                if (deleted.ok) this.dismissModal('confirm_delete_profile');
                return;
            }

            case 'delete_mcp':
                this.showModal('confirm_delete_mcp', event.id);
                return;

            case 'confirm_delete_mcp': {
                const deleted = await this.attempt('Delete Failed', () => this.mcp.delete(event.id));
                if (deleted.ok) this.dismissModal('confirm_delete_mcp');
                return;
            }

            case 'set_hotkey': {
                const hotkey = event.hotkey.trim();
                if (!hotkey) {
                    this.showError('Invalid Hotkey', 'Hotkey cannot be empty', 'warning');
                    return;
                }
                await this.attempt(TITLE, () => this.appSettings.setHotkey(hotkey));
                return;
            }

            case 'set_theme':
                await this.attempt(TITLE, () => this.appSettings.setTheme(event.theme));
                return;

            default:
                return;
        }
    }

    private async onProfile(event: ProfileEvent): Promise<void> {
        switch (event.type) {
            case 'created':
                this.emit({ type: 'profile_created', id: event.id, name: event.name });
                return;
            case 'updated':
                this.emit({ type: 'profile_updated', id: event.id, name: event.name });
                return;
            case 'deleted':
                this.emit({ type: 'profile_deleted', id: event.id });
                await this.persistDefault((saved) => saved === event.id);
                return;
            case 'default_changed':
                this.emit({ type: 'default_profile_changed', id: event.to });
                await this.persistDefault((saved, current) => saved !== current);
                return;
            default:
                return;
        }
    }

    private onMcp(event: McpEvent): void {
        switch (event.type) {
            case 'starting':
            case 'restarting':
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'starting' });
                return;
            case 'started':
                this.emit({ type: 'mcp_server_started', id: event.id, toolCount: event.toolCount });
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'running' });
                return;
            case 'start_failed':
                this.emit({ type: 'mcp_server_failed', id: event.id, error: event.error });
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'failed' });
                return;
            case 'stopped':
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'stopped' });
                return;
            case 'unhealthy':
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'unhealthy' });
                return;
            case 'recovered':
                this.emit({ type: 'mcp_status_changed', id: event.id, status: 'running' });
                this.emit({ type: 'show_notification', message: `${event.name} recovered`, level: 'success' });
                return;
            case 'deleted':
                this.emit({ type: 'mcp_deleted', id: event.id });
                return;
            default:
                return;
        }
    }

    private async onSystem(event: SystemEvent): Promise<void> {
        switch (event.type) {
            case 'config_loaded':
                await this.refresh();
                return;
            case 'config_saved':
                this.emit({ type: 'show_notification', message: 'Settings saved', level: 'success' });
                return;
            case 'hotkey_changed':
            case 'theme_changed': {
                const prefs = await this.attempt(TITLE, async () => ({
                    hotkey: await this.appSettings.getHotkey(),
                    theme: await this.appSettings.getTheme(),
                }));
                if (prefs.ok) this.emit({ type: 'settings_updated', ...prefs.value });
                return;
            }
            case 'models_registry_refreshed':
                this.emit({
                    type: 'show_notification',
                    message: `Model registry updated: ${event.providerCount} providers, ${event.modelCount} models`,
                    level: 'info',
                });
                return;
            default:
                return;
        }
    }

    private async refresh(): Promise<void> {
        const loaded = await this.attempt(TITLE, async () => {
            const [profiles, mcpServers, hotkey, theme] = await Promise.all([
                this.profileSummaries(),
                this.mcpSummaries(),
                this.appSettings.getHotkey(),
                this.appSettings.getTheme(),
            ]);
            return { profiles, mcpServers, hotkey, theme };
        });
        if (loaded.ok) this.emit({ type: 'show_settings', ...loaded.value });
    }

    /** The profile service owns the default; the config file only mirrors it */
    private async persistDefault(when: (saved: string | null, current: string | null) => boolean): Promise<void> {
        await this.attempt(TITLE, async () => {
            const current = (await this.profiles.getDefault())?.id ?? null;
            const saved = await this.appSettings.getDefaultProfileId();
            if (saved !== current && when(saved, current)) await this.appSettings.setDefaultProfileId(current);
        });
    }

    private async profileSummaries(): Promise<ProfileSummary[]> {
        const [profiles, current] = await Promise.all([this.profiles.list(), this.profiles.getDefault()]);
        const defaultId = current?.id ?? null;
        return profiles.map((p) => ({
            id: p.id,
            name: p.name,
            providerId: p.providerId,
            modelId: p.modelId,
            isDefault: p.id === defaultId,
        }));
    }

    private async mcpSummaries(): Promise<McpServerSummary[]> {
        const servers = await this.mcp.list();
        return Promise.all(
            servers.map(async (server) => {
                const status = await this.mcp.getStatus(server.id);
                const tools = status === 'running' ? await this.mcp.getAvailableTools(server.id) : [];
                return { id: server.id, name: server.name, enabled: server.enabled, status, toolCount: tools.length };
            }),
        );
    }
}
