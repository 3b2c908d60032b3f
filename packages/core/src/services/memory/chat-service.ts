/**
 * @perch/core: Echo ChatService
 *
 * Stand-in for the external agent loop. It streams a canned reply word by
 * word on a timer, honours cancellation, and saves the finished reply
 * through the ConversationService.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { AppEvents, DEFAULT_STREAM_CHUNK_DELAY_MS, ServiceError, createLogger, describeError } from '@perch/shared';
import type { AppEvent, ChatEvent } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { ChatService } from '../chat-service.js';
import type { ConversationService } from '../conversation-service.js';

const log = createLogger('EchoChat');

export interface EchoChatOptions {
    readonly chunkDelayMs?: number;
    readonly modelId?: string;
    /** Builds the reply for a user message */
    readonly reply?: (text: string) => string;
}

interface ActiveStream {
    readonly conversationId: string;
    readonly messageId: string;
    readonly controller: AbortController;
    done: Promise<void>;
}

function isAbort(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

export class EchoChatService implements ChatService {
    private active: ActiveStream | null = null;
    private readonly chunkDelayMs: number;
    private readonly modelId: string;
    private readonly reply: (text: string) => string;

    constructor(
        private readonly events: EventPublisher<AppEvent>,
        private readonly conversations: ConversationService,
        options: EchoChatOptions = {},
    ) {
        this.chunkDelayMs = options.chunkDelayMs ?? DEFAULT_STREAM_CHUNK_DELAY_MS;
        this.modelId = options.modelId ?? 'echo';
        this.reply = options.reply ?? ((text) => `You said: ${text}`);
    }

    async sendMessage(conversationId: string, text: string): Promise<void> {
        if (this.active) {
            throw ServiceError.validation('A reply is already streaming');
        }
        // Fails fast on an unknown conversation
        await this.conversations.getMessages(conversationId);

        const stream: ActiveStream = {
            conversationId,
            messageId: uuidv4(),
            controller: new AbortController(),
            done: Promise.resolve(),
        };
        this.active = stream;
        this.emit({ type: 'stream_started', conversationId, messageId: stream.messageId, modelId: this.modelId });

        stream.done = this.run(stream, this.reply(text)).finally(() => {
            if (this.active === stream) this.active = null;
        });
    }

    async cancel(): Promise<void> {
        const stream = this.active;
        if (!stream) return;
        stream.controller.abort();
        await stream.done;
    }

    isStreaming(): boolean {
        return this.active !== null;
    }

    /** Resolves when the current stream (if any) has finished */
    async idle(): Promise<void> {
        await this.active?.done;
    }

    // ── Private ───────────────────────────────────────────────────

    private async run(stream: ActiveStream, reply: string): Promise<void> {
        const { conversationId, messageId, controller } = stream;
        const words = reply.split(/(?<=\s)/);
        let content = '';

        try {
            this.emit({ type: 'thinking_delta', conversationId, text: 'Composing a reply' });
            for (const word of words) {
                await sleep(this.chunkDelayMs, undefined, { signal: controller.signal });
                content += word;
                this.emit({ type: 'text_delta', conversationId, text: word });
            }
        } catch (err) {
            if (isAbort(err)) {
                log.debug(`Stream ${messageId} cancelled after ${content.length} chars`);
                this.emit({ type: 'stream_cancelled', conversationId, messageId, partialContent: content });
                return;
            }
            this.emit({ type: 'stream_error', conversationId, error: describeError(err), recoverable: true });
            return;
        }

        try {
            const saved = await this.conversations.addAssistantMessage(conversationId, content);
            this.emit({ type: 'stream_completed', conversationId, messageId, totalTokens: words.length });
            this.emit({ type: 'message_saved', conversationId, messageId: saved.id });
        } catch (err) {
            log.error(`Could not save reply for ${conversationId}`, err);
            this.emit({ type: 'stream_error', conversationId, error: describeError(err), recoverable: false });
        }
    }

    private emit(event: ChatEvent): void {
        this.events.publish(AppEvents.chat(event));
    }
}
