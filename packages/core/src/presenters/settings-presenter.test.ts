import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AppEvents, ServiceError } from '@perch/shared';
import type { AppEvent, McpServerConfig, ModelProfile } from '@perch/shared';
import type { EventBus } from '../events/event-bus.js';
import {
    ConfigAppSettingsService,
    MemoryProfileService,
    SimulatedMcpService,
    memorySettingsStore,
} from '../services/memory/index.js';
import type { SettingsStore } from '../services/memory/index.js';
import { createHarness, flush, user, waitFor } from '../test-utils.js';
import type { RecordingSink } from '../test-utils.js';
import { SettingsPresenter } from './settings-presenter.js';

const params = { temperature: 0.7, maxTokens: 4096, thinkingEnabled: false };
const WORK: ModelProfile = { id: 'p-work', name: 'Work', providerId: 'anthropic', modelId: 'claude-sonnet-4', parameters: params };
const LOCAL: ModelProfile = { id: 'p-local', name: 'Local', providerId: 'ollama', modelId: 'llama3.1:8b', parameters: params };

let bus: EventBus<AppEvent>;
let sink: RecordingSink;
let store: SettingsStore;
let profiles: MemoryProfileService;
let mcp: SimulatedMcpService;
let presenter: SettingsPresenter;
let server: McpServerConfig;

beforeEach(async () => {
    ({ bus, sink } = createHarness());
    store = memorySettingsStore();
    profiles = new MemoryProfileService(bus, { seed: [WORK, LOCAL], defaultId: WORK.id });
    mcp = new SimulatedMcpService(bus, {
        tools: () => [
            { name: 'read_file', description: 'Read a file' },
            { name: 'write_file', description: 'Write a file' },
        ],
    });
    server = await mcp.add({ name: 'Files', transport: 'stdio', command: 'mcp-files', args: [], env: {}, enabled: false });
    const appSettings = new ConfigAppSettingsService(bus, store);
    presenter = new SettingsPresenter({ bus, sink }, { profiles, appSettings, mcp });
    presenter.start();
});

afterEach(() => {
    presenter.stop();
    bus.close();
    vi.restoreAllMocks();
});

describe('SettingsPresenter', () => {
    it('loads the settings screen', async () => {
        bus.publish(user({ type: 'navigate', to: 'settings' }));
        await flush();

        expect(sink.commands).toEqual([
            {
                type: 'show_settings',
                profiles: [
                    { id: 'p-local', name: 'Local', providerId: 'ollama', modelId: 'llama3.1:8b', isDefault: false },
                    { id: 'p-work', name: 'Work', providerId: 'anthropic', modelId: 'claude-sonnet-4', isDefault: true },
                ],
                mcpServers: [{ id: server.id, name: 'Files', enabled: false, status: 'stopped', toolCount: 0 }],
                hotkey: 'Cmd+Shift+Space',
                theme: 'dark',
            },
        ]);
    });

    it('also loads on config_loaded', async () => {
        bus.publish(AppEvents.system({ type: 'config_loaded' }));
        await flush();
        expect(sink.types()).toEqual(['show_settings']);
    });

    it('changes the default profile and persists it', async () => {
        bus.publish(user({ type: 'select_profile', id: LOCAL.id }));
        await waitFor(() => sink.commands.length === 2);

        expect(sink.commands).toEqual([
            { type: 'default_profile_changed', id: LOCAL.id },
            { type: 'show_notification', message: 'Settings saved', level: 'success' },
        ]);
        expect(store.read().defaultProfileId).toBe(LOCAL.id);
        expect((await profiles.getDefault())?.id).toBe(LOCAL.id);
    });

    it('moves the default when the default profile is deleted', async () => {
        bus.publish(user({ type: 'select_profile', id: LOCAL.id }));
        bus.publish(user({ type: 'confirm_delete_profile', id: LOCAL.id }));
        await waitFor(() => sink.ofType('default_profile_changed').length === 2);
        await flush();

        expect(sink.ofType('default_profile_changed')).toEqual([
            { type: 'default_profile_changed', id: LOCAL.id },
            { type: 'default_profile_changed', id: WORK.id },
        ]);
        expect(store.read().defaultProfileId).toBe(WORK.id);

        sink.clear();
        bus.publish(user({ type: 'navigate', to: 'settings' }));
        await flush();
        const [screen] = sink.ofType('show_settings');
        expect(screen?.profiles).toEqual([
            { id: 'p-work', name: 'Work', providerId: 'anthropic', modelId: 'claude-sonnet-4', isDefault: true },
        ]);
    });

    it('clears the saved default when the last profile is deleted', async () => {
        bus.publish(user({ type: 'select_profile', id: LOCAL.id }));
        await waitFor(() => store.read().defaultProfileId === LOCAL.id);

        bus.publish(user({ type: 'confirm_delete_profile', id: WORK.id }));
        bus.publish(user({ type: 'confirm_delete_profile', id: LOCAL.id }));
        await waitFor(() => sink.ofType('profile_deleted').length === 2);
        await flush();

        expect(store.read().defaultProfileId).toBeNull();
        expect(await profiles.getDefault()).toBeNull();
    });

    it('toggles an MCP server and follows its lifecycle', async () => {
        bus.publish(user({ type: 'toggle_mcp', id: server.id, enabled: true }));
        await flush();

        expect(sink.commands).toEqual([
            { type: 'mcp_status_changed', id: server.id, status: 'starting' },
            { type: 'mcp_server_started', id: server.id, toolCount: 2 },
            { type: 'mcp_status_changed', id: server.id, status: 'running' },
        ]);

        sink.clear();
        bus.publish(user({ type: 'toggle_mcp', id: server.id, enabled: false }));
        await flush();
        expect(sink.commands).toEqual([{ type: 'mcp_status_changed', id: server.id, status: 'stopped' }]);
    });

    it('confirms before deleting a profile', async () => {
        bus.publish(user({ type: 'delete_profile', id: LOCAL.id }));
        await flush();
        expect(sink.commands).toEqual([{ type: 'show_modal', modal: 'confirm_delete_profile', targetId: LOCAL.id }]);

        sink.clear();
        bus.publish(user({ type: 'confirm_delete_profile', id: LOCAL.id }));
        await flush();
        expect(sink.commands).toEqual([{ type: 'dismiss_modal' }, { type: 'profile_deleted', id: LOCAL.id }]);
    });

    it('confirms before deleting an MCP server', async () => {
        bus.publish(user({ type: 'delete_mcp', id: server.id }));
        bus.publish(user({ type: 'confirm_delete_mcp', id: server.id }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_modal', modal: 'confirm_delete_mcp', targetId: server.id },
            { type: 'dismiss_modal' },
            { type: 'mcp_deleted', id: server.id },
        ]);
    });

    it('saves the hotkey', async () => {
        bus.publish(user({ type: 'set_hotkey', hotkey: ' Ctrl+Space ' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_notification', message: 'Settings saved', level: 'success' },
            { type: 'settings_updated', hotkey: 'Ctrl+Space', theme: 'dark' },
        ]);
    });

    it('rejects an empty hotkey', async () => {
        bus.publish(user({ type: 'set_hotkey', hotkey: '  ' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Invalid Hotkey', message: 'Hotkey cannot be empty', severity: 'warning' },
        ]);
        expect(store.read().hotkey).toBe('Cmd+Shift+Space');
    });

    it('announces a recovered server', async () => {
        bus.publish(AppEvents.mcp({ type: 'recovered', id: 'm1', name: 'Files' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'mcp_status_changed', id: 'm1', status: 'running' },
            { type: 'show_notification', message: 'Files recovered', level: 'success' },
        ]);
    });

    it('announces a model registry refresh', async () => {
        bus.publish(AppEvents.system({ type: 'models_registry_refreshed', providerCount: 4, modelCount: 9 }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_notification', message: 'Model registry updated: 4 providers, 9 models', level: 'info' },
        ]);
    });

    it('shows one error when the screen cannot be loaded', async () => {
        vi.spyOn(mcp, 'list').mockRejectedValue(ServiceError.internal('supervisor offline'));
        bus.publish(user({ type: 'navigate', to: 'settings' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Settings Error', message: 'Internal error: supervisor offline', severity: 'error' },
        ]);
    });
});
