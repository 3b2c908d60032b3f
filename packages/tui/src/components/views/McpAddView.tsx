/**
 * McpAddView: search the MCP registry and install a server
 *
 * Opens on the trending list. `/` edits the query, ←/→ switch between
 * all, official and community sources, Enter installs the highlighted
 * server.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import SelectInput from 'ink-select-input';
import TextInput from 'ink-text-input';
import type { McpRegistrySource, UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';

const SOURCES: readonly McpRegistrySource[] = ['all', 'official', 'community'];

export function cycleSource(source: McpRegistrySource, step: 1 | -1): McpRegistrySource {
    const index = (SOURCES.indexOf(source) + step + SOURCES.length) % SOURCES.length;
    return SOURCES[index] ?? 'all';
}

// ─── Props ────────────────────────────────────────────────────────

export interface McpAddViewProps {
    readonly registry: ViewState['mcp']['registry'];
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function McpAddView({ registry, active, send }: McpAddViewProps): React.ReactElement {
    const [query, setQuery] = useState('');
    const [source, setSource] = useState<McpRegistrySource>('all');
    const [searching, setSearching] = useState(false);

    const search = (text: string, from: McpRegistrySource): void => {
        send({ type: 'search_mcp_registry', query: text, source: from });
    };

    useInput((input, key) => {
        if (searching) return;
        if (input === '/') setSearching(true);
        if (key.leftArrow || key.rightArrow) {
            const next = cycleSource(source, key.rightArrow ? 1 : -1);
            setSource(next);
            search(query, next);
        }
    }, { isActive: active });

    const items = registry.entries.map((entry) => ({
        key: entry.name,
        label: `${entry.title}  [${entry.source}] ${entry.tags.join(', ')}${entry.envKeys.length > 0 ? '  🔑' : ''}`,
        value: entry.name,
    }));

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} minHeight={10}>
            <Text bold color="cyan" underline>Add MCP Server</Text>
            <Box gap={1}>
                <Text color="gray">Search:</Text>
                {searching ? (
                    <TextInput
                        value={query}
                        onChange={setQuery}
                        focus={active}
                        onSubmit={(text) => {
                            search(text, source);
                            setSearching(false);
                        }}
                    />
                ) : (
                    <Text>{registry.query || <Text color="gray" dimColor>trending</Text>}</Text>
                )}
                <Text color="magenta">‹ {source} ›</Text>
            </Box>

            {items.length === 0 ? (
                <Text color="gray" italic>No servers match.</Text>
            ) : (
                <SelectInput
                    items={items}
                    isFocused={active && !searching}
                    limit={10}
                    onSelect={(item) => send({ type: 'select_mcp_from_registry', name: item.value })}
                />
            )}
            <Text color="gray" dimColor>Enter: install  •  /: search  •  ←/→: source  •  Esc: back</Text>
        </Box>
    );
}
