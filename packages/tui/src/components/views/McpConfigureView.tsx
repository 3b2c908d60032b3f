/**
 * McpConfigureView: edit one MCP server's launch settings
 *
 * Ctrl+O starts the OAuth flow for servers that have a provider; the
 * authorization URL is shown for the user to open.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import type { UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';
import { FieldList } from '../form/FieldList.js';
import type { Field } from '../form/FieldList.js';
import { mcpFields, toMcpDraft, valuesOf, withValue } from './drafts.js';

// ─── Props ────────────────────────────────────────────────────────

export interface McpConfigureViewProps {
    readonly mcp: ViewState['mcp'];
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function McpConfigureView({ mcp, active, send }: McpConfigureViewProps): React.ReactElement {
    const [fields, setFields] = useState<Field[]>([]);
    const [focused, setFocused] = useState(0);
    const server = mcp.configure?.server ?? null;

    useEffect(() => {
        if (!server) return;
        setFields(mcpFields(server));
        setFocused(0);
    }, [server]);

    useInput((input, key) => {
        if (server && key.ctrl && input === 'o') send({ type: 'start_mcp_oauth', id: server.id });
    }, { isActive: active });

    if (!mcp.configure || !server) {
        return <Text color="yellow">⏳ Loading server...</Text>;
    }

    const tools = mcp.tools[server.id] ?? [];

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
            <Text bold color="cyan" underline>Configure {server.name}</Text>
            <FieldList
                fields={fields}
                focused={focused}
                active={active}
                errors={mcp.configure.errors}
                onFocus={setFocused}
                onChange={(key, value) => setFields((prev) => withValue(prev, key, value))}
                onSubmit={() => send({ type: 'save_mcp_config', id: server.id, config: toMcpDraft(valuesOf(fields), server) })}
            />

            <Text bold>Tools ({tools.length})</Text>
            {tools.map((tool) => (
                <Text key={tool.name} color="gray">  🔧 {tool.name} <Text dimColor>{tool.description}</Text></Text>
            ))}

            {mcp.authorizeUrl && (
                <Text color="yellow" wrap="wrap">🔑 Open to authorize: {mcp.authorizeUrl}</Text>
            )}
            <Text color="gray" dimColor>
                ↑/↓: field  •  Enter: next, save on the last field{server.oauthProvider ? '  •  Ctrl+O: authorize' : ''}  •  Esc: back
            </Text>
        </Box>
    );
}
