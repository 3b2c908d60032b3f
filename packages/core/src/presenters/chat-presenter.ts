/**
 * @perch/core: Chat Presenter
 *
 * Drives the chat panel: sending messages, relaying the streamed reply,
 * tool-call progress and the rename flow for the open conversation.
 */

import { ServiceError, describeError } from '@perch/shared';
import type { AppEvent, ChatEvent, ConversationEvent, UserEvent } from '@perch/shared';
import type { ChatService, ConversationService, ProfileService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export interface ChatPresenterServices {
    readonly conversations: ConversationService;
    readonly chat: ChatService;
    readonly profiles: ProfileService;
}

const TITLE = 'Chat Error';

export class ChatPresenter extends Presenter {
    private readonly conversations: ConversationService;
    private readonly chat: ChatService;
    private readonly profiles: ProfileService;

    constructor(context: PresenterContext, services: ChatPresenterServices) {
        super('ChatPresenter', context);
        this.conversations = services.conversations;
        this.chat = services.chat;
        this.profiles = services.profiles;
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        switch (event.type) {
            case 'user':
                return this.onUser(event.payload);
            case 'chat':
                return this.onChat(event.payload);
            case 'conversation':
                return this.onConversation(event.payload);
            default:
                return;
        }
    }

    // ── User actions ──────────────────────────────────────────────

    private async onUser(event: UserEvent): Promise<void> {
        switch (event.type) {
            case 'send_message':
                return this.sendMessage(event.text);

            case 'stop_streaming':
                await this.attempt(TITLE, () => this.chat.cancel());
                return;

            case 'new_conversation':
                await this.attempt(TITLE, () => this.startConversation());
                return;

            case 'toggle_thinking':
                this.emit({ type: 'toggle_thinking_visibility' });
                return;

            case 'start_rename_conversation': {
                const loaded = await this.attempt('Rename Failed', () => this.conversations.load(event.id));
                if (loaded.ok) {
                    this.emit({ type: 'conversation_rename_started', id: event.id, currentTitle: loaded.value.title });
                }
                return;
            }

            case 'confirm_rename_conversation': {
                const title = event.title.trim();
                if (!title) {
                    this.showError('Rename Failed', 'Title cannot be empty', 'warning');
                    return;
                }
                // conversation_renamed follows from the title_updated event
                await this.attempt('Rename Failed', () => this.conversations.rename(event.id, title));
                return;
            }

            case 'cancel_rename_conversation':
                this.emit({ type: 'conversation_rename_cancelled' });
                return;

            default:
                return;
        }
    }

    private async sendMessage(raw: string): Promise<void> {
        const text = raw.trim();
        if (!text) return;

        if (this.chat.isStreaming()) {
            this.showError(TITLE, 'Wait for the current reply to finish or stop it first', 'warning');
            return;
        }

        const target = await this.attempt(TITLE, () => this.activeConversation());
        if (!target.ok) return;
        const conversationId = target.value;

        const saved = await this.attempt(TITLE, () => this.conversations.addUserMessage(conversationId, text));
        if (!saved.ok) return;

        this.emit({ type: 'message_appended', conversationId, role: 'user', content: text });
        this.emit({ type: 'show_thinking' });

        const sent = await this.attempt(TITLE, () => this.chat.sendMessage(conversationId, text));
        if (!sent.ok) {
            this.emit({ type: 'stream_error', conversationId, error: describeError(sent.error), recoverable: true });
            this.emit({ type: 'hide_thinking' });
        }
    }

    /** Id of the active conversation, creating one when there is none */
    private async activeConversation(): Promise<string> {
        const active = await this.conversations.getActive();
        if (active) return active;
        return this.startConversation();
    }

    private async startConversation(): Promise<string> {
        const profile = await this.profiles.getDefault();
        if (!profile) {
            throw ServiceError.configuration('No default model profile. Create one in Settings first');
        }

        const conversation = await this.conversations.create(undefined, profile.id);
        await this.conversations.setActive(conversation.id);
        this.emit({ type: 'conversation_created', id: conversation.id, title: conversation.title });
        this.emit({ type: 'conversation_activated', id: conversation.id, title: conversation.title });
        return conversation.id;
    }

    // ── Streaming ─────────────────────────────────────────────────

    private onChat(event: ChatEvent): void {
        switch (event.type) {
            case 'stream_started':
                this.emit({ type: 'show_thinking' });
                return;
            case 'text_delta':
                this.emit({ type: 'append_stream', conversationId: event.conversationId, text: event.text });
                return;
            case 'thinking_delta':
                this.emit({ type: 'append_thinking', conversationId: event.conversationId, text: event.text });
                return;
            case 'tool_call_started':
                this.emit({
                    type: 'show_tool_call',
                    conversationId: event.conversationId,
                    toolCallId: event.toolCallId,
                    toolName: event.toolName,
                });
                return;
            case 'tool_call_completed':
                this.emit({
                    type: 'update_tool_call',
                    toolCallId: event.toolCallId,
                    status: event.success ? 'completed' : 'failed',
                    result: event.result,
                    durationMs: event.durationMs,
                });
                return;
            case 'stream_completed':
                this.emit({
                    type: 'finalize_stream',
                    conversationId: event.conversationId,
                    messageId: event.messageId,
                    tokens: event.totalTokens,
                });
                this.emit({ type: 'hide_thinking' });
                return;
            case 'stream_cancelled':
                this.emit({ type: 'stream_cancelled', conversationId: event.conversationId, partialContent: event.partialContent });
                this.emit({ type: 'hide_thinking' });
                return;
            case 'stream_error':
                // The dialog itself is the ErrorPresenter's
                this.emit({
                    type: 'stream_error',
                    conversationId: event.conversationId,
                    error: event.error,
                    recoverable: event.recoverable,
                });
                this.emit({ type: 'hide_thinking' });
                return;
            case 'message_saved':
                this.emit({ type: 'message_saved', conversationId: event.conversationId, messageId: event.messageId });
                return;
        }
    }

    // ── Conversation changes ──────────────────────────────────────

    private async onConversation(event: ConversationEvent): Promise<void> {
        switch (event.type) {
            case 'activated': {
                const loaded = await this.attempt('Could Not Open Conversation', () => this.conversations.load(event.id));
                if (loaded.ok) {
                    const { id, title, messages } = loaded.value;
                    this.emit({ type: 'conversation_loaded', id, title, messages });
                }
                return;
            }
            case 'title_updated':
                this.emit({ type: 'conversation_renamed', id: event.id, title: event.title });
                return;
            case 'deactivated':
                this.emit({ type: 'conversation_cleared' });
                return;
            default:
                return;
        }
    }
}
