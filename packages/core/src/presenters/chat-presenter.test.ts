import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AppEvents, ServiceError } from '@perch/shared';
import type { AppEvent, ModelProfile } from '@perch/shared';
import type { EventBus } from '../events/event-bus.js';
import { EchoChatService, MemoryConversationService, MemoryProfileService } from '../services/memory/index.js';
import { createHarness, flush, user, waitFor } from '../test-utils.js';
import type { RecordingSink } from '../test-utils.js';
import { ChatPresenter } from './chat-presenter.js';

const PROFILE: ModelProfile = {
    id: 'profile-1',
    name: 'Default',
    providerId: 'anthropic',
    modelId: 'claude-sonnet-4',
    parameters: { temperature: 0.7, maxTokens: 4096, thinkingEnabled: false },
};

let bus: EventBus<AppEvent>;
let sink: RecordingSink;
let conversations: MemoryConversationService;
let profiles: MemoryProfileService;
let chat: EchoChatService;
let presenter: ChatPresenter;

function setup(chunkDelayMs = 0, reply = 'Hello there'): void {
    ({ bus, sink } = createHarness());
    conversations = new MemoryConversationService(bus);
    profiles = new MemoryProfileService(bus, { seed: [PROFILE] });
    chat = new EchoChatService(bus, conversations, { chunkDelayMs, reply: () => reply });
    presenter = new ChatPresenter({ bus, sink }, { conversations, chat, profiles });
    presenter.start();
}

beforeEach(() => setup());

afterEach(async () => {
    await chat.cancel();
    presenter.stop();
    bus.close();
    vi.restoreAllMocks();
});

// ─── send_message ────────────────────────────────────────────────

describe('send_message', () => {
    it('creates a conversation, appends the message and streams the reply', async () => {
        bus.publish(user({ type: 'send_message', text: '  Hi  ' }));
        await waitFor(() => sink.ofType('finalize_stream').length === 1);

        expect(sink.types().slice(0, 4)).toEqual(['conversation_created', 'conversation_activated', 'message_appended', 'show_thinking']);
        const [appended] = sink.ofType('message_appended');
        expect(appended).toMatchObject({ role: 'user', content: 'Hi' });

        expect(sink.ofType('append_stream').map((c) => c.text).join('')).toBe('Hello there');
        expect(sink.ofType('append_thinking')).toHaveLength(1);
        expect(sink.ofType('finalize_stream')[0]?.tokens).toBe(2);

        const id = sink.ofType('conversation_created')[0]?.id ?? '';
        await waitFor(() => sink.ofType('message_saved').length === 1);
        const messages = await conversations.getMessages(id);
        expect(messages.map((m) => [m.role, m.content])).toEqual([
            ['user', 'Hi'],
            ['assistant', 'Hello there'],
        ]);
    });

    it('reuses the active conversation', async () => {
        const existing = await conversations.create('Ongoing', PROFILE.id);
        await conversations.setActive(existing.id);
        await flush();
        sink.clear();

        bus.publish(user({ type: 'send_message', text: 'again' }));
        await waitFor(() => sink.ofType('finalize_stream').length === 1);

        expect(sink.ofType('conversation_created')).toEqual([]);
        expect(sink.ofType('message_appended')[0]?.conversationId).toBe(existing.id);
    });

    it('ignores blank input', async () => {
        bus.publish(user({ type: 'send_message', text: '   ' }));
        await flush();
        expect(sink.commands).toEqual([]);
    });

    it('asks for a profile when none is configured', async () => {
        await profiles.delete(PROFILE.id);
        await flush();
        sink.clear();

        bus.publish(user({ type: 'send_message', text: 'Hi' }));
        await flush();
        expect(sink.commands).toEqual([
            {
                type: 'show_error',
                title: 'Chat Error',
                message: 'Configuration error: No default model profile. Create one in Settings first',
                severity: 'error',
            },
        ]);
    });

    it('turns a failed send into one show_error and ends the stream state', async () => {
        vi.spyOn(chat, 'sendMessage').mockRejectedValue(ServiceError.network('provider unreachable'));

        bus.publish(user({ type: 'send_message', text: 'Hi' }));
        await flush();

        expect(sink.ofType('show_error')).toEqual([
            { type: 'show_error', title: 'Chat Error', message: 'Network error: provider unreachable', severity: 'error' },
        ]);
        expect(sink.types().filter((t) => t !== 'conversation_loaded')).toEqual([
            'conversation_created',
            'conversation_activated',
            'message_appended',
            'show_thinking',
            'show_error',
            'stream_error',
            'hide_thinking',
        ]);
    });
});

// ─── streaming events ────────────────────────────────────────────

describe('chat events', () => {
    it('maps stream events to view commands', async () => {
        const publish = (event: Parameters<typeof AppEvents.chat>[0]): void => {
            bus.publish(AppEvents.chat(event));
        };
        publish({ type: 'text_delta', conversationId: 'c1', text: 'Hel' });
        publish({ type: 'tool_call_started', conversationId: 'c1', toolCallId: 't1', toolName: 'read_file' });
        publish({
            type: 'tool_call_completed',
            conversationId: 'c1',
            toolCallId: 't1',
            toolName: 'read_file',
            success: false,
            result: 'ENOENT',
            durationMs: 12,
        });
        publish({ type: 'stream_error', conversationId: 'c1', error: 'rate limited', recoverable: true });
        await flush();

        expect(sink.commands).toEqual([
            { type: 'append_stream', conversationId: 'c1', text: 'Hel' },
            { type: 'show_tool_call', conversationId: 'c1', toolCallId: 't1', toolName: 'read_file' },
            { type: 'update_tool_call', toolCallId: 't1', status: 'failed', result: 'ENOENT', durationMs: 12 },
            { type: 'stream_error', conversationId: 'c1', error: 'rate limited', recoverable: true },
            { type: 'hide_thinking' },
        ]);
    });

    it('stop_streaming cancels the active reply', async () => {
        await chat.cancel();
        presenter.stop();
        bus.close();
        setup(40, 'one two three four five six seven eight');

        bus.publish(user({ type: 'send_message', text: 'Hi' }));
        await waitFor(() => sink.ofType('append_stream').length >= 1);
        bus.publish(user({ type: 'stop_streaming' }));
        await waitFor(() => sink.ofType('stream_cancelled').length === 1);

        expect(sink.ofType('finalize_stream')).toEqual([]);
        expect(sink.types().at(-1)).toBe('hide_thinking');
        expect(chat.isStreaming()).toBe(false);
    });
});

// ─── conversations ───────────────────────────────────────────────

describe('conversation flow', () => {
    it('new_conversation creates and activates one', async () => {
        bus.publish(user({ type: 'new_conversation' }));
        await flush();

        const [created] = sink.ofType('conversation_created');
        expect(created?.title).toBe('New Conversation');
        expect(sink.ofType('conversation_activated')[0]?.id).toBe(created?.id);
        expect(sink.ofType('conversation_loaded')[0]).toMatchObject({ id: created?.id, messages: [] });
    });

    it('runs the rename flow', async () => {
        const conversation = await conversations.create(undefined, PROFILE.id);
        await flush();
        sink.clear();

        bus.publish(user({ type: 'start_rename_conversation', id: conversation.id }));
        bus.publish(user({ type: 'confirm_rename_conversation', id: conversation.id, title: '  Trip plans ' }));
        await flush();

        expect(sink.commands).toEqual([
            { type: 'conversation_rename_started', id: conversation.id, currentTitle: 'New Conversation' },
            { type: 'conversation_renamed', id: conversation.id, title: 'Trip plans' },
        ]);
    });

    it('rejects an empty title', async () => {
        bus.publish(user({ type: 'confirm_rename_conversation', id: 'any', title: '   ' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Rename Failed', message: 'Title cannot be empty', severity: 'warning' },
        ]);
    });

    it('reports a missing conversation when renaming', async () => {
        bus.publish(user({ type: 'start_rename_conversation', id: 'missing' }));
        await flush();
        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Rename Failed', message: 'Not found: conversation missing', severity: 'error' },
        ]);
    });

    it('toggles thinking visibility and clears on deactivation', async () => {
        bus.publish(user({ type: 'toggle_thinking' }));
        bus.publish(AppEvents.conversation({ type: 'deactivated', id: 'c1' }));
        await flush();
        expect(sink.commands).toEqual([{ type: 'toggle_thinking_visibility' }, { type: 'conversation_cleared' }]);
    });
});
