/**
 * InputBox: message input with slash command palette
 *
 * Typing `/` into an empty prompt opens the palette instead of inserting
 * the character. While `locked` is set (a dialog or rename prompt owns
 * the keyboard) input is visually disabled and keystrokes are ignored.
 */

import React from 'react';
import { Box, Text } from 'ink';
import SelectInput from 'ink-select-input';
import TextInput from 'ink-text-input';

// ─── Palette ──────────────────────────────────────────────────────

export type PaletteAction =
    | 'new'
    | 'history'
    | 'settings'
    | 'model'
    | 'add-mcp'
    | 'thinking'
    | 'rename'
    | 'stop'
    | 'close';

interface PaletteEntry {
    readonly label: string;
    readonly value: PaletteAction;
    /** What can be typed instead of picking the entry */
    readonly command: string | null;
}

export const PALETTE_ITEMS: readonly PaletteEntry[] = [
    { label: '✨ /new        - Start a new conversation', value: 'new', command: '/new' },
    { label: '📜 /history    - Browse conversations', value: 'history', command: '/history' },
    { label: '⚙️  /settings   - Profiles, MCP servers, preferences', value: 'settings', command: '/settings' },
    { label: '🧠 /model      - Pick a model', value: 'model', command: '/model' },
    { label: '🔌 /mcp add    - Install an MCP server', value: 'add-mcp', command: '/mcp add' },
    { label: '💭 /thinking   - Show or hide reasoning', value: 'thinking', command: '/thinking' },
    { label: '✏️  /rename     - Rename this conversation', value: 'rename', command: '/rename' },
    { label: '⏹  /stop       - Stop the current reply', value: 'stop', command: '/stop' },
    { label: '❌ Close Menu', value: 'close', command: null },
];

/** Typed form of a palette entry, e.g. `/history` */
export function parseSlashCommand(text: string): PaletteAction | null {
    const typed = text.trim().toLowerCase().replace(/\s+/g, ' ');
    if (!typed.startsWith('/')) return null;
    return PALETTE_ITEMS.find((item) => item.command === typed)?.value ?? null;
}

// ─── Props ────────────────────────────────────────────────────────

export interface InputBoxProps {
    readonly value: string;
    readonly isStreaming: boolean;
    readonly isPaletteOpen: boolean;
    readonly locked: boolean;
    readonly onChange: (value: string) => void;
    readonly onSubmit: (value: string) => void;
    readonly onPaletteSelect: (action: PaletteAction) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function InputBox(props: InputBoxProps): React.ReactElement {
    const { value, isStreaming, isPaletteOpen, locked, onChange, onSubmit, onPaletteSelect } = props;

    const borderColor = locked ? 'red' : isStreaming ? 'yellow' : 'green';
    const promptIcon = locked ? '⏸' : isStreaming ? '⏳' : '❯';

    return (
        <Box flexDirection="column">
            {isPaletteOpen && !locked && (
                <Box flexDirection="column" marginLeft={2} borderStyle="bold" borderColor="yellow" paddingX={1}>
                    <Text bold color="yellow">🚀 COMMAND PALETTE</Text>
                    <SelectInput
                        items={PALETTE_ITEMS.map(({ label, value }) => ({ label, value }))}
                        onSelect={(item) => onPaletteSelect(item.value)}
                    />
                    <Text dimColor color="gray"> Esc: cancel </Text>
                </Box>
            )}

            <Box borderStyle="single" borderColor={borderColor} paddingX={1}>
                <Text color={borderColor} bold>{promptIcon} </Text>
                {locked ? (
                    <Text color="red" italic>Input locked while a dialog is open</Text>
                ) : (
                    <TextInput
                        value={value}
                        onChange={onChange}
                        onSubmit={onSubmit}
                        focus={!isPaletteOpen}
                        placeholder={isStreaming ? 'Replying... /stop to interrupt' : 'Message, or / for commands'}
                    />
                )}
            </Box>
        </Box>
    );
}
