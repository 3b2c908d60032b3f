/**
 * QuickPanel: overlay with the state of profiles and MCP servers
 *
 * Shown and hidden only through the PopoverController, so a toggle
 * requested by a keystroke lands on the next frame.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { McpStatus } from '@perch/shared';
import type { PopoverAnchor } from '../state/deferred-operations.js';
import type { ViewState } from '../state/view-state.js';

const STATUS_ICON: Record<McpStatus, { icon: string; color: string }> = {
    starting: { icon: '◐', color: 'yellow' },
    running: { icon: '●', color: 'green' },
    stopped: { icon: '○', color: 'gray' },
    failed: { icon: '✖', color: 'red' },
    unhealthy: { icon: '⚠', color: 'yellow' },
};

// ─── Props ────────────────────────────────────────────────────────

export interface QuickPanelProps {
    readonly anchor: PopoverAnchor | null;
    readonly state: ViewState;
}

// ─── Component ────────────────────────────────────────────────────

export function QuickPanel({ anchor, state }: QuickPanelProps): React.ReactElement | null {
    if (!anchor) return null;
    const { profiles, mcpServers } = state.settings;

    return (
        <Box
            flexDirection="column"
            borderStyle="bold"
            borderColor="yellow"
            paddingX={1}
            alignSelf={anchor === 'status_bar' ? 'flex-end' : 'flex-start'}
        >
            <Text bold color="yellow">⚡ QUICK VIEW</Text>

            <Text bold>Profiles</Text>
            {profiles.length === 0 && <Text color="gray" italic>  none</Text>}
            {profiles.map((p) => (
                <Text key={p.id} color={p.isDefault ? 'green' : 'white'}>
                    {p.isDefault ? '★' : ' '} {p.name} <Text color="gray">{p.providerId}/{p.modelId}</Text>
                </Text>
            ))}

            <Text bold>MCP servers</Text>
            {mcpServers.length === 0 && <Text color="gray" italic>  none</Text>}
            {mcpServers.map((s) => {
                const status = STATUS_ICON[s.status];
                return (
                    <Text key={s.id}>
                        <Text color={status.color}>{status.icon}</Text> {s.name}
                        <Text color="gray"> {s.status}, {s.toolCount} tools</Text>
                    </Text>
                );
            })}

            <Text color="gray" dimColor>Tab: close</Text>
        </Box>
    );
}
