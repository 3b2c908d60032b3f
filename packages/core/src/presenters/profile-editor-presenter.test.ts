import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { blankProfileDraft, profileToDraft } from '@perch/shared';
import type { AppEvent, ConnectionTestResult, ModelProfile } from '@perch/shared';
import type { EventBus } from '../events/event-bus.js';
import { MemoryProfileService, MemorySecretsService } from '../services/memory/index.js';
import { createHarness, flush, user } from '../test-utils.js';
import type { RecordingSink } from '../test-utils.js';
import { ProfileEditorPresenter } from './profile-editor-presenter.js';

const params = { temperature: 0.7, maxTokens: 4096, thinkingEnabled: false };
const WORK: ModelProfile = { id: 'p-work', name: 'Work', providerId: 'anthropic', modelId: 'claude-sonnet-4', parameters: params };
const LOCAL: ModelProfile = { id: 'p-local', name: 'Local', providerId: 'ollama', modelId: 'llama3.1:8b', parameters: params };

let bus: EventBus<AppEvent>;
let sink: RecordingSink;
let profiles: MemoryProfileService;
let secrets: MemorySecretsService;
let presenter: ProfileEditorPresenter;
let probeResult: ConnectionTestResult;

beforeEach(() => {
    ({ bus, sink } = createHarness());
    probeResult = { success: true, responseTimeMs: 42 };
    profiles = new MemoryProfileService(bus, { seed: [WORK, LOCAL], defaultId: WORK.id, probe: async () => probeResult });
    secrets = new MemorySecretsService();
    presenter = new ProfileEditorPresenter({ bus, sink }, { profiles, secrets });
    presenter.start();
});

afterEach(() => {
    presenter.stop();
    bus.close();
});

describe('ProfileEditorPresenter', () => {
    // ─── Loading ─────────────────────────────────────────────────

    it('opens a blank editor for a new profile', async () => {
        bus.publish(user({ type: 'create_profile' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'profile_editor_loaded', mode: 'create', draft: blankProfileDraft() },
            { type: 'navigate_to', view: 'profile_editor' },
        ]);
    });

    it('opens an existing profile for editing', async () => {
        bus.publish(user({ type: 'edit_profile', id: WORK.id }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'profile_editor_loaded', mode: 'edit', draft: profileToDraft(WORK) },
            { type: 'navigate_to', view: 'profile_editor' },
        ]);
    });

    it('reports a missing profile instead of navigating', async () => {
        bus.publish(user({ type: 'edit_profile', id: 'nope' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Profile Error', message: 'Not found: profile nope', severity: 'error' },
        ]);
    });

    // ─── Saving ──────────────────────────────────────────────────

    it('rejects an invalid draft and announces it on the bus', async () => {
        const observer = bus.subscribe();
        bus.publish(user({ type: 'save_profile', draft: { name: '  ', providerId: 'anthropic', modelId: 'claude-sonnet-4' } }));
        await flush();

        expect(sink.commands).toEqual([{ type: 'profile_validation_failed', errors: ['name: Name is required'] }]);

        const seen: AppEvent[] = [];
        for (let r = observer.tryRecv(); r.status === 'event'; r = observer.tryRecv()) seen.push(r.event);
        expect(seen.filter((e) => e.type === 'profile')).toEqual([
            { type: 'profile', payload: { type: 'validation_failed', id: null, errors: ['name: Name is required'] } },
        ]);
        expect(await profiles.list()).toHaveLength(2);
    });

    it('creates a profile and keeps its API key in the secret store', async () => {
        bus.publish(
            user({
                type: 'save_profile',
                draft: { name: 'Research', providerId: 'openai', modelId: 'gpt-4o', apiKey: ' test-secret ', temperature: 0.2 },
            }),
        );
        await flush();

        expect(sink.types()).toEqual(['profile_saved', 'navigate_back']);
        const [saved] = sink.ofType('profile_saved');
        const id = saved?.id ?? '';

        const profile = await profiles.get(id);
        expect(profile).toMatchObject({
            name: 'Research',
            providerId: 'openai',
            modelId: 'gpt-4o',
            apiKeyRef: `api_key:${id}`,
            parameters: { temperature: 0.2, maxTokens: 4096, thinkingEnabled: false },
        });
        expect(await secrets.getApiKey(id)).toBe('test-secret');
    });

    it('updates an existing profile', async () => {
        bus.publish(user({ type: 'save_profile', draft: { ...profileToDraft(WORK), name: 'Work (long context)', maxTokens: 8192 } }));
        await flush();

        expect(sink.commands).toEqual([{ type: 'profile_saved', id: WORK.id }, { type: 'navigate_back' }]);
        const updated = await profiles.get(WORK.id);
        expect(updated.name).toBe('Work (long context)');
        expect(updated.parameters.maxTokens).toBe(8192);
        expect(updated.apiKeyRef).toBeUndefined();
    });

    it('stays in the editor when the service rejects the save', async () => {
        bus.publish(user({ type: 'save_profile', draft: { ...profileToDraft(WORK), name: 'local' } }));
        await flush();

        expect(sink.commands).toEqual([
            {
                type: 'show_error',
                title: 'Save Failed',
                message: 'Validation error: A profile named "local" already exists',
                severity: 'error',
            },
        ]);
    });

    // ─── Connection test ─────────────────────────────────────────

    it('reports the connection test lifecycle', async () => {
        bus.publish(user({ type: 'test_profile_connection', id: WORK.id }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'profile_test_started', id: WORK.id },
            { type: 'profile_test_completed', id: WORK.id, success: true, responseTimeMs: 42, error: undefined },
        ]);
    });

    it('warns when the connection test fails', async () => {
        probeResult = { success: false, responseTimeMs: 7, error: 'Invalid API key' };
        bus.publish(user({ type: 'test_profile_connection', id: WORK.id }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Connection Test Failed', message: 'Invalid API key', severity: 'warning' },
            { type: 'profile_test_started', id: WORK.id },
            { type: 'profile_test_completed', id: WORK.id, success: false, responseTimeMs: 7, error: 'Invalid API key' },
        ]);
    });

    it('drops the API key of a deleted profile', async () => {
        await secrets.storeApiKey(LOCAL.id, 'test-secret');
        await profiles.delete(LOCAL.id);
        await flush();

        expect(await secrets.getApiKey(LOCAL.id)).toBeNull();
        expect(sink.commands).toEqual([]);
    });
});
