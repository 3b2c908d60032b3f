/**
 * @perch/core: ChatService contract
 *
 * `sendMessage` resolves once the request is accepted; the reply then
 * arrives as `chat:*` events on the bus.
 */

export interface ChatService {
    sendMessage(conversationId: string, text: string): Promise<void>;
    /** Cancel the active stream, if any */
    cancel(): Promise<void>;
    isStreaming(): boolean;
}
