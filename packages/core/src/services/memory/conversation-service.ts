/**
 * @perch/core: In-memory ConversationService
 */

import { v4 as uuidv4 } from 'uuid';
import { AppEvents, DEFAULT_CONVERSATION_PAGE_SIZE, DEFAULT_CONVERSATION_TITLE, ServiceError } from '@perch/shared';
import type { AppEvent, ChatMessage, Conversation, ConversationEvent, ConversationSummary, MessageRole } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { ConversationService } from '../conversation-service.js';

interface Entry {
    conversation: Conversation;
    /** Monotonic touch counter; orders conversations updated in the same millisecond */
    touched: number;
}

export class MemoryConversationService implements ConversationService {
    private readonly entries = new Map<string, Entry>();
    private activeId: string | null = null;
    private clock = 0;

    constructor(
        private readonly events: EventPublisher<AppEvent>,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async create(title: string | undefined, profileId: string): Promise<Conversation> {
        const timestamp = this.now().toISOString();
        const conversation: Conversation = {
            id: uuidv4(),
            title: title?.trim() || DEFAULT_CONVERSATION_TITLE,
            profileId,
            createdAt: timestamp,
            updatedAt: timestamp,
            messages: [],
        };
        this.entries.set(conversation.id, { conversation, touched: ++this.clock });
        this.emit({ type: 'created', id: conversation.id, title: conversation.title });
        return conversation;
    }

    async load(id: string): Promise<Conversation> {
        const conversation = this.require(id).conversation;
        this.emit({ type: 'loaded', id });
        return conversation;
    }

    async list(limit = DEFAULT_CONVERSATION_PAGE_SIZE, offset = 0): Promise<ConversationSummary[]> {
        return [...this.entries.values()]
            .sort((a, b) => b.touched - a.touched)
            .slice(offset, offset + limit)
            .map(({ conversation }) => ({
                id: conversation.id,
                title: conversation.title,
                messageCount: conversation.messages.length,
                updatedAt: conversation.updatedAt,
                isActive: conversation.id === this.activeId,
            }));
    }

    async addUserMessage(id: string, content: string): Promise<ChatMessage> {
        return this.append(id, 'user', content);
    }

    async addAssistantMessage(id: string, content: string, thinking?: string): Promise<ChatMessage> {
        return this.append(id, 'assistant', content, thinking);
    }

    async rename(id: string, title: string): Promise<void> {
        const trimmed = title.trim();
        if (!trimmed) throw ServiceError.validation('Conversation title cannot be empty');

        const entry = this.require(id);
        entry.conversation = { ...entry.conversation, title: trimmed, updatedAt: this.now().toISOString() };
        entry.touched = ++this.clock;
        this.emit({ type: 'title_updated', id, title: trimmed });
    }

    async delete(id: string): Promise<void> {
        this.require(id);
        this.entries.delete(id);
        if (this.activeId === id) {
            this.activeId = null;
            this.emit({ type: 'deactivated', id });
        }
        this.emit({ type: 'deleted', id });
    }

    async setActive(id: string): Promise<void> {
        this.require(id);
        if (this.activeId === id) return;
        this.activeId = id;
        this.emit({ type: 'activated', id });
    }

    async getActive(): Promise<string | null> {
        return this.activeId;
    }

    async getMessages(id: string): Promise<ChatMessage[]> {
        return [...this.require(id).conversation.messages];
    }

    // ── Private ───────────────────────────────────────────────────

    private append(id: string, role: MessageRole, content: string, thinking?: string): ChatMessage {
        const entry = this.require(id);
        const message: ChatMessage = {
            id: uuidv4(),
            role,
            content,
            createdAt: this.now().toISOString(),
            ...(thinking ? { thinking } : {}),
        };
        entry.conversation = {
            ...entry.conversation,
            messages: [...entry.conversation.messages, message],
            updatedAt: message.createdAt,
        };
        entry.touched = ++this.clock;
        return message;
    }

    private require(id: string): Entry {
        const entry = this.entries.get(id);
        if (!entry) throw ServiceError.notFound(`conversation ${id}`);
        return entry;
    }

    private emit(event: ConversationEvent): void {
        this.events.publish(AppEvents.conversation(event));
    }
}
