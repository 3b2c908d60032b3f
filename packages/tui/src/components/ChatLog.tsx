/**
 * ChatLog: transcript of the active conversation
 *
 * Renders finished turns, the reply that is still streaming with its
 * cursor, the tool calls it made and (when toggled on) its reasoning.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { MessageRole } from '@perch/shared';
import type { ChatState, ToolCallView, TranscriptEntry } from '../state/view-state.js';

export const MAX_CHAT_ENTRIES = 30;

// ─── Props ────────────────────────────────────────────────────────

export interface ChatLogProps {
    readonly chat: ChatState;
}

// ─── Helpers ──────────────────────────────────────────────────────

const ROLE_STYLE: Record<MessageRole, { icon: string; color: string }> = {
    user: { icon: '🧑', color: 'white' },
    assistant: { icon: '🤖', color: 'green' },
    system: { icon: '⚙', color: 'gray' },
    tool: { icon: '🔧', color: 'magenta' },
};

function toolLabel(call: ToolCallView): { text: string; color: string } {
    switch (call.status) {
        case 'running':
            return { text: `🔧 ${call.name}...`, color: 'magenta' };
        case 'completed':
            return { text: `✅ ${call.name} (${call.durationMs ?? 0}ms) ${call.result ?? ''}`.trimEnd(), color: 'green' };
        case 'failed':
            return { text: `❌ ${call.name}: ${call.result ?? 'failed'}`, color: 'red' };
    }
}

function Entry({ entry, showThinking }: { entry: TranscriptEntry; showThinking: boolean }): React.ReactElement {
    const style = ROLE_STYLE[entry.role];
    return (
        <Box flexDirection="column">
            {showThinking && entry.thinking && (
                <Text color="gray" dimColor italic wrap="wrap">💭 {entry.thinking}</Text>
            )}
            <Text wrap="wrap" color={style.color} bold={entry.role === 'user'}>
                {style.icon} {entry.content}
                {entry.outcome === 'cancelled' && <Text color="yellow"> [stopped]</Text>}
                {entry.outcome === 'error' && <Text color="red"> [failed]</Text>}
            </Text>
        </Box>
    );
}

// ─── Component ────────────────────────────────────────────────────

export function ChatLog({ chat }: ChatLogProps): React.ReactElement {
    const visible = chat.transcript.slice(-MAX_CHAT_ENTRIES);
    const empty = visible.length === 0 && !chat.isStreaming;

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} minHeight={10}>
            <Text bold color="cyan" underline>{chat.title ?? 'New conversation'}</Text>

            {empty ? (
                <Text color="gray" italic>Type a message below and press Enter...</Text>
            ) : (
                <>
                    {visible.map((entry, i) => (
                        <Entry key={i} entry={entry} showThinking={chat.showThinking} />
                    ))}
                    {chat.toolCalls.map((call) => {
                        const label = toolLabel(call);
                        return (
                            <Text key={call.id} color={label.color} italic wrap="wrap">{label.text}</Text>
                        );
                    })}
                    {chat.showThinking && chat.thinkingText && (
                        <Text color="gray" dimColor italic wrap="wrap">💭 {chat.thinkingText}</Text>
                    )}
                    {chat.streamingText && (
                        <Text color="green" wrap="wrap">
                            {chat.streamingText}
                            <Text color="yellow" bold>▊</Text>
                        </Text>
                    )}
                </>
            )}

            {chat.isStreaming && !chat.streamingText && (
                <Text color="yellow" italic>⏳ {chat.isThinking ? 'Thinking' : 'Waiting for the model'}...</Text>
            )}
        </Box>
    );
}
