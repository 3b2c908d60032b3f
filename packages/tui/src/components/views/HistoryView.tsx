/**
 * HistoryView: conversation list
 *
 * Enter opens a conversation, R renames and D deletes the highlighted
 * one (after confirmation).
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import SelectInput from 'ink-select-input';
import type { UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';

// ─── Props ────────────────────────────────────────────────────────

export interface HistoryViewProps {
    readonly history: ViewState['history'];
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function HistoryView({ history, active, send }: HistoryViewProps): React.ReactElement {
    const [highlighted, setHighlighted] = useState<string | null>(null);
    const current = highlighted ?? history.summaries[0]?.id ?? null;

    useInput((input) => {
        if (!current) return;
        const lower = input.toLowerCase();
        if (lower === 'd') send({ type: 'delete_conversation', id: current });
        if (lower === 'r') send({ type: 'start_rename_conversation', id: current });
    }, { isActive: active });

    const items = history.summaries.map((c) => ({
        key: c.id,
        label: `${c.isActive ? '●' : ' '} ${c.title}  (${c.messageCount} msgs, ${c.updatedAt.slice(0, 16).replace('T', ' ')})`,
        value: c.id,
    }));

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} minHeight={10}>
            <Text bold color="cyan" underline>History ({history.count})</Text>
            {items.length === 0 ? (
                <Text color="gray" italic>No conversations yet.</Text>
            ) : (
                <SelectInput
                    items={items}
                    isFocused={active}
                    limit={12}
                    onHighlight={(item) => setHighlighted(item.value)}
                    onSelect={(item) => send({ type: 'select_conversation', id: item.value })}
                />
            )}
            <Text color="gray" dimColor>Enter: open  •  R: rename  •  D: delete  •  Esc: back</Text>
        </Box>
    );
}
