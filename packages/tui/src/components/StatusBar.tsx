/**
 * StatusBar: one-line summary of the assistant's state
 *
 * Shows the current view path, whether a reply is streaming, the
 * default profile's model and how many MCP servers are running.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { VIEW_TITLES } from '@perch/shared';
import type { ViewId } from '@perch/shared';
import type { ViewState } from '../state/view-state.js';

// ─── Helpers ──────────────────────────────────────────────────────

export function breadcrumb(stack: readonly ViewId[]): string {
    return stack.map((view) => VIEW_TITLES[view]).join(' › ');
}

function defaultModel(state: ViewState): string | null {
    const profile = state.settings.profiles.find((p) => p.isDefault);
    return profile ? `${profile.name} (${profile.modelId})` : null;
}

// ─── Props ────────────────────────────────────────────────────────

export interface StatusBarProps {
    readonly state: ViewState;
    readonly stack: readonly ViewId[];
}

// ─── Component ────────────────────────────────────────────────────

export function StatusBar({ state, stack }: StatusBarProps): React.ReactElement {
    const { chat } = state;
    const running = state.settings.mcpServers.filter((s) => s.status === 'running').length;
    const failing = Object.keys(state.mcp.failures).length;
    const model = defaultModel(state);

    return (
        <Box borderStyle="single" borderColor={chat.isStreaming ? 'yellow' : 'gray'} paddingX={1} justifyContent="space-between">
            <Box gap={2}>
                <Text color="cyan">{breadcrumb(stack)}</Text>
                {chat.isStreaming ? (
                    <Text color="yellow" bold>◐ STREAMING</Text>
                ) : (
                    <Text color="green">● IDLE</Text>
                )}
            </Box>

            <Box gap={2}>
                {running > 0 && <Text color="cyan">🔌 MCP:{running}</Text>}
                {failing > 0 && <Text color="red" bold>⚠ {failing} failing</Text>}
                {chat.lastTokens !== null && <Text color="gray">tokens:{chat.lastTokens}</Text>}
                {model && <Text color="magenta">🧠 {model}</Text>}
            </Box>
        </Box>
    );
}
