import { describe, it, expect } from 'vitest';
import { blankProfileDraft } from '@perch/shared';
import type { ProfileDraft, ViewCommand } from '@perch/shared';
import { MAX_NOTIFICATIONS, applyViewCommand, initialViewState } from './view-state.js';
import type { ViewState } from './view-state.js';

function reduce(commands: readonly ViewCommand[], from: ViewState = initialViewState()): ViewState {
    return commands.reduce(applyViewCommand, from);
}

const OPEN_C1: ViewCommand[] = [
    { type: 'conversation_created', id: 'c1', title: 'New Conversation' },
    { type: 'conversation_activated', id: 'c1', title: 'New Conversation' },
];

describe('applyViewCommand', () => {
    // ─── Chat ────────────────────────────────────────────────────

    it('builds a reply from the stream', () => {
        const state = reduce([
            ...OPEN_C1,
            { type: 'message_appended', conversationId: 'c1', role: 'user', content: 'hello' },
            { type: 'show_thinking' },
            { type: 'append_thinking', conversationId: 'c1', text: 'Composing a reply' },
            { type: 'append_stream', conversationId: 'c1', text: 'You ' },
            { type: 'append_stream', conversationId: 'c1', text: 'said: hello' },
        ]);
        expect(state.chat).toMatchObject({ streamingText: 'You said: hello', isStreaming: true, isThinking: true });

        const done = reduce(
            [
                { type: 'finalize_stream', conversationId: 'c1', messageId: 'm2', tokens: 3 },
                { type: 'hide_thinking' },
            ],
            state,
        );
        expect(done.chat.transcript).toEqual([
            { role: 'user', content: 'hello' },
            { role: 'assistant', content: 'You said: hello', thinking: 'Composing a reply' },
        ]);
        expect(done.chat).toMatchObject({ streamingText: '', thinkingText: '', isStreaming: false, isThinking: false, lastTokens: 3 });
    });

    it('keeps a cancelled partial reply', () => {
        const state = reduce([
            ...OPEN_C1,
            { type: 'append_stream', conversationId: 'c1', text: 'Half' },
            { type: 'stream_cancelled', conversationId: 'c1', partialContent: 'Half' },
        ]);
        expect(state.chat.transcript).toEqual([{ role: 'assistant', content: 'Half', outcome: 'cancelled' }]);
        expect(state.chat.isStreaming).toBe(false);
    });

    it('records a stream error in the transcript', () => {
        const state = reduce([
            ...OPEN_C1,
            { type: 'stream_error', conversationId: 'c1', error: 'Rate limited', recoverable: true },
        ]);
        expect(state.chat.transcript).toEqual([{ role: 'system', content: 'Rate limited', outcome: 'error' }]);
    });

    it('drops stream output for a conversation that is not open', () => {
        const before = reduce(OPEN_C1);
        const after = reduce([{ type: 'append_stream', conversationId: 'c2', text: 'stray' }], before);
        expect(after).toBe(before);
    });

    it('replaces the transcript when another conversation loads', () => {
        const state = reduce([
            ...OPEN_C1,
            { type: 'message_appended', conversationId: 'c1', role: 'user', content: 'first' },
            {
                type: 'conversation_loaded',
                id: 'c2',
                title: 'Older chat',
                messages: [{ id: 'm1', role: 'user', content: 'from before', createdAt: '2026-01-01T00:00:00.000Z' }],
            },
        ]);
        expect(state.chat).toMatchObject({ conversationId: 'c2', title: 'Older chat', transcript: [{ role: 'user', content: 'from before' }] });
    });

    it('tracks tool calls until the reply is finished', () => {
        const state = reduce([
            ...OPEN_C1,
            { type: 'show_tool_call', conversationId: 'c1', toolCallId: 't1', toolName: 'read_file' },
            { type: 'update_tool_call', toolCallId: 't1', status: 'completed', result: '12 lines', durationMs: 40 },
        ]);
        expect(state.chat.toolCalls).toEqual([{ id: 't1', name: 'read_file', status: 'completed', result: '12 lines', durationMs: 40 }]);

        const done = reduce([{ type: 'finalize_stream', conversationId: 'c1', messageId: 'm1', tokens: null }], state);
        expect(done.chat.toolCalls).toEqual([]);
    });

    it('keeps thinking visibility across conversations', () => {
        const state = reduce([{ type: 'toggle_thinking_visibility' }, ...OPEN_C1, { type: 'conversation_cleared' }]);
        expect(state.chat.showThinking).toBe(true);
        expect(state.chat.conversationId).toBeNull();
    });

    it('runs the rename flow', () => {
        const started = reduce([...OPEN_C1, { type: 'conversation_rename_started', id: 'c1', currentTitle: 'New Conversation' }]);
        expect(started.chat.rename).toEqual({ id: 'c1', title: 'New Conversation' });

        const renamed = reduce([{ type: 'conversation_renamed', id: 'c1', title: 'Groceries' }], started);
        expect(renamed.chat).toMatchObject({ title: 'Groceries', rename: null });

        const cancelled = reduce([{ type: 'conversation_rename_cancelled' }], started);
        expect(cancelled.chat).toMatchObject({ title: 'New Conversation', rename: null });
    });

    // ─── History ─────────────────────────────────────────────────

    it('removes a deleted conversation everywhere', () => {
        const summary = { title: 'Chat', messageCount: 2, updatedAt: '2026-01-01T00:00:00.000Z', isActive: false };
        const state = reduce([
            ...OPEN_C1,
            {
                type: 'conversation_list_refreshed',
                summaries: [
                    { ...summary, id: 'c1', isActive: true },
                    { ...summary, id: 'c2' },
                ],
            },
            { type: 'conversation_deleted', id: 'c1' },
        ]);
        expect(state.history.summaries.map((s) => s.id)).toEqual(['c2']);
        expect(state.history.count).toBe(1);
        expect(state.chat.conversationId).toBeNull();
    });

    // ─── Settings ────────────────────────────────────────────────

    it('follows profile changes on the settings screen', () => {
        const state = reduce([
            {
                type: 'show_settings',
                profiles: [{ id: 'p1', name: 'Work', providerId: 'anthropic', modelId: 'claude-sonnet-4', isDefault: true }],
                mcpServers: [],
                hotkey: 'Cmd+Shift+Space',
                theme: 'dark',
            },
            { type: 'profile_created', id: 'p2', name: 'Home' },
            { type: 'profile_updated', id: 'p1', name: 'Office' },
            { type: 'default_profile_changed', id: 'p2' },
        ]);
        expect(state.settings.profiles.map((p) => [p.id, p.name, p.isDefault])).toEqual([
            ['p1', 'Office', false],
            ['p2', 'Home', true],
        ]);

        const deleted = reduce([{ type: 'profile_deleted', id: 'p1' }], state);
        expect(deleted.settings.profiles.map((p) => p.id)).toEqual(['p2']);
    });

    it('reflects MCP status changes and failures', () => {
        const state = reduce([
            {
                type: 'show_settings',
                profiles: [],
                mcpServers: [{ id: 'm1', name: 'Postgres', enabled: true, status: 'starting', toolCount: 0 }],
                hotkey: 'Cmd+Shift+Space',
                theme: 'dark',
            },
            { type: 'mcp_server_failed', id: 'm1', error: 'Missing environment variable(s): DATABASE_URL' },
        ]);
        expect(state.settings.mcpServers[0]?.status).toBe('failed');
        expect(state.mcp.failures).toEqual({ m1: 'Missing environment variable(s): DATABASE_URL' });

        const started = reduce([{ type: 'mcp_server_started', id: 'm1', toolCount: 1 }], state);
        expect(started.settings.mcpServers[0]).toMatchObject({ status: 'running', toolCount: 1 });
        expect(started.mcp.failures).toEqual({});
    });

    it('records connection test results per profile', () => {
        const state = reduce([
            { type: 'profile_test_started', id: 'p1' },
            { type: 'profile_test_completed', id: 'p1', success: false, responseTimeMs: 12, error: 'Invalid API key' },
        ]);
        expect(state.profileTests).toEqual({ p1: { status: 'failed', responseTimeMs: 12, error: 'Invalid API key' } });
    });

    it('keeps only the most recent notifications', () => {
        const commands: ViewCommand[] = Array.from({ length: MAX_NOTIFICATIONS + 3 }, (_, i): ViewCommand => ({
            type: 'show_notification',
            message: `note ${i}`,
            level: 'info',
        }));
        const state = reduce(commands);
        expect(state.notifications).toHaveLength(MAX_NOTIFICATIONS);
        expect(state.notifications[0]?.message).toBe('note 3');
    });

    // ─── Editors ─────────────────────────────────────────────────

    it('shows validation errors in the open profile editor', () => {
        const state = reduce([
            { type: 'profile_editor_loaded', mode: 'create', draft: { name: '', providerId: '', modelId: '' } },
            { type: 'profile_validation_failed', errors: ['name: Name is required'] },
        ]);
        expect(state.profileEditor?.errors).toEqual(['name: Name is required']);
        expect(reduce([{ type: 'profile_saved', id: 'p9' }], state).profileEditor).toBeNull();
    });

    it('ignores validation errors with no editor open', () => {
        const before = initialViewState();
        expect(applyViewCommand(before, { type: 'mcp_validation_failed', errors: ['url: URL is required for http servers'] })).toBe(before);
    });

    // ─── Models ──────────────────────────────────────────────────

    it('puts a picked model into the open profile draft', () => {
        const draft: ProfileDraft = {
            ...blankProfileDraft(),
            id: 'p1',
            name: 'Work',
            providerId: 'anthropic',
            modelId: 'claude-sonnet-4',
            baseUrl: 'https://proxy.test',
        };
        const sameProvider = reduce([
            { type: 'profile_editor_loaded', mode: 'edit', draft },
            { type: 'model_selected', providerId: 'anthropic', modelId: 'claude-3-5-haiku', baseUrl: 'https://api.anthropic.test' },
        ]);
        expect(sameProvider.profileEditor?.draft).toEqual({ ...draft, modelId: 'claude-3-5-haiku' });
        expect(sameProvider.models.selected).toBeNull();
        expect(sameProvider.notifications).toEqual([]);

        const otherProvider = reduce(
            [{ type: 'model_selected', providerId: 'openai', modelId: 'gpt-4o', baseUrl: 'https://api.openai.test/v1' }],
            sameProvider,
        );
        expect(otherProvider.profileEditor?.draft).toEqual({
            ...draft,
            providerId: 'openai',
            modelId: 'gpt-4o',
            baseUrl: 'https://api.openai.test/v1',
        });
    });

    it('holds a model picked outside the editor for the next new profile', () => {
        const picked = reduce([{ type: 'model_selected', providerId: 'openai', modelId: 'gpt-4o' }]);
        expect(picked.models.selected).toEqual({ providerId: 'openai', modelId: 'gpt-4o' });
        expect(picked.notifications).toEqual([
            { message: 'openai/gpt-4o will be used for the next new profile', level: 'info' },
        ]);

        const edit: ProfileDraft = { ...blankProfileDraft(), id: 'p1', name: 'Work', providerId: 'ollama', modelId: 'llama3.1:8b' };
        const editing = reduce([{ type: 'profile_editor_loaded', mode: 'edit', draft: edit }], picked);
        expect(editing.profileEditor?.draft).toEqual(edit);
        expect(editing.models.selected).toEqual({ providerId: 'openai', modelId: 'gpt-4o' });

        const creating = reduce([{ type: 'profile_editor_loaded', mode: 'create', draft: blankProfileDraft() }], editing);
        expect(creating.profileEditor?.draft).toEqual({ ...blankProfileDraft(), providerId: 'openai', modelId: 'gpt-4o' });
        expect(creating.models.selected).toBeNull();
    });

    // ─── Dialogs & navigation ────────────────────────────────────

    it('opens and closes the error dialog and modals', () => {
        const state = reduce([
            { type: 'show_error', title: 'Save Failed', message: 'Storage error: disk full', severity: 'error' },
            { type: 'show_modal', modal: 'confirm_delete_profile', targetId: 'p1' },
        ]);
        expect(state.error).toEqual({ title: 'Save Failed', message: 'Storage error: disk full', severity: 'error' });
        expect(state.modal).toEqual({ modal: 'confirm_delete_profile', targetId: 'p1' });

        const cleared = reduce([{ type: 'clear_error' }, { type: 'dismiss_modal' }], state);
        expect(cleared.error).toBeNull();
        expect(cleared.modal).toBeNull();
    });

    it('leaves navigation to the frame driver', () => {
        const before = initialViewState();
        expect(applyViewCommand(before, { type: 'navigate_to', view: 'settings' })).toBe(before);
        expect(applyViewCommand(before, { type: 'navigate_back' })).toBe(before);
    });
});
