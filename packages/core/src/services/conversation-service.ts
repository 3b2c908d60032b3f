/**
 * @perch/core: ConversationService contract
 *
 * Implementations publish `conversation:*` events for every change.
 */

import type { ChatMessage, Conversation, ConversationSummary } from '@perch/shared';

export interface ConversationService {
    create(title: string | undefined, profileId: string): Promise<Conversation>;
    load(id: string): Promise<Conversation>;
    /** Most recently updated first */
    list(limit?: number, offset?: number): Promise<ConversationSummary[]>;
    addUserMessage(id: string, content: string): Promise<ChatMessage>;
    addAssistantMessage(id: string, content: string, thinking?: string): Promise<ChatMessage>;
    rename(id: string, title: string): Promise<void>;
    delete(id: string): Promise<void>;
    setActive(id: string): Promise<void>;
    getActive(): Promise<string | null>;
    getMessages(id: string): Promise<ChatMessage[]>;
}
